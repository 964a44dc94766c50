import 'dotenv/config'
import { createInterface } from 'node:readline/promises'
import { stdin, stdout } from 'node:process'
import { loadConfig } from './config.js'
import { mathRandom, mulberry32 } from './engine/index.js'
import { silentLogger } from './logging.js'
import { MatchService } from './services/matchService.js'
import { runTerminalGame } from './terminal/terminalGame.js'

const config = loadConfig()
const seed = config.randomSeed

const matchService = new MatchService({
  limits: config.limits,
  learningRates: config.learningRates,
  createRandom: () => (seed === null ? mathRandom : mulberry32(seed)),
  // stdout carries the game text only
  logger: silentLogger,
})

const rl = createInterface({ input: stdin, output: stdout })

try {
  await runTerminalGame({
    ask: question => rl.question(question),
    print: line => console.log(line),
  }, matchService)
} finally {
  rl.close()
}
