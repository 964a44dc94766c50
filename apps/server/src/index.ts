import 'dotenv/config'
import { buildServer, NAMESPACE } from './app.js'
import { loadConfig } from './config.js'
import { jsonLogger } from './logging.js'

const config = loadConfig()
const fastify = await buildServer({ config, logger: jsonLogger })

async function shutdown(signal: string): Promise<void> {
  jsonLogger({ evt: 'server.shutdown', signal })
  await fastify.close()
  process.exit(0)
}

// Graceful shutdown handling
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch(err => {
    fastify.log.error(err)
    process.exit(1)
  })
})

process.on('SIGINT', () => {
  shutdown('SIGINT').catch(err => {
    fastify.log.error(err)
    process.exit(1)
  })
})

try {
  await fastify.listen({ port: config.port, host: config.host })

  jsonLogger({
    evt: 'server.start',
    port: config.port,
    namespace: NAMESPACE,
    ...config.learningRates,
    ...config.limits,
  })
} catch (err: unknown) {
  if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
    jsonLogger({
      evt: 'server.error',
      error: 'EADDRINUSE',
      port: config.port,
      message: `Port ${config.port} is already in use`,
    })
    process.exit(1)
  }
  fastify.log.error(err)
  process.exit(1)
}
