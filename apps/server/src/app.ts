import Fastify, { FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import fastifySocketIOModule from 'fastify-socket.io'
import { Socket } from 'socket.io'
import { v4 as uuidv4 } from 'uuid'
import { CONCRETE_STATES, mathRandom, mulberry32 } from './engine/index.js'
import { ServerConfig } from './config.js'
import { EventLogger, jsonLogger } from './logging.js'
import { MatchService } from './services/matchService.js'
import {
  MatchFinishedEvent,
  RoundPlayedEvent,
  ThrowMovePayload,
  ThrowRejectReason,
  ThrowRejectedEvent,
} from './types/match.js'

// Single namespace constant
export const NAMESPACE = '/game'

// The plugin ships as CommonJS: Node's loader hands over module.exports, Vitest the plugin itself
const fastifySocketIO = 'default' in fastifySocketIOModule ? fastifySocketIOModule.default : fastifySocketIOModule

const REJECT_STATUS: Record<ThrowRejectReason, number> = {
  invalid_move: 400,
  not_your_match: 403,
  match_not_found: 404,
  match_finished: 409,
  duplicate_selection: 409,
}

export interface BuildServerOptions {
  config: ServerConfig
  matchService?: MatchService
  logger?: EventLogger
  // Fastify's request logger; off in tests
  httpLogging?: boolean
}

interface CreateMatchBody {
  playerId: string
}

interface ThrowBody {
  playerId: string
  move: unknown
  selectionId?: string
}

const createMatchSchema = {
  body: {
    type: 'object',
    required: ['playerId'],
    properties: {
      playerId: { type: 'string', minLength: 1 },
    },
  },
}

// Untyped so Ajv does not coerce it; the match service checks the move
const throwSchema = {
  body: {
    type: 'object',
    required: ['playerId', 'move'],
    properties: {
      playerId: { type: 'string', minLength: 1 },
      move: {},
      selectionId: { type: 'string', minLength: 1 },
    },
  },
}

export function parseThrowPayload(data: unknown): ThrowMovePayload | null {
  if (typeof data !== 'object' || data === null) return null
  if (!('matchId' in data) || !('move' in data) || !('selectionId' in data)) return null
  const { matchId, move, selectionId } = data
  if (typeof matchId !== 'string' || typeof move !== 'number' || typeof selectionId !== 'string') {
    return null
  }
  return { matchId, move, selectionId }
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config } = options
  const log = options.logger ?? jsonLogger
  const seed = config.randomSeed
  const matchService = options.matchService ?? new MatchService({
    limits: config.limits,
    learningRates: config.learningRates,
    createRandom: () => (seed === null ? mathRandom : mulberry32(seed)),
    logger: log,
  })

  const fastify = Fastify({
    logger: options.httpLogging === false ? false : { level: config.logLevel },
  })

  await fastify.register(cors, {
    origin: true, // Allow all origins for development
    methods: ['GET', 'POST', 'DELETE'],
    credentials: true,
  })

  await fastify.register(fastifySocketIO, {
    cors: {
      origin: true,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  })

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      learningRates: config.learningRates,
      ...matchService.getLimits(),
      activeMatches: matchService.getActiveMatchCount(),
    }
  })

  fastify.post<{ Body: CreateMatchBody }>('/matches', { schema: createMatchSchema }, async (request, reply) => {
    const match = matchService.createMatch(request.body.playerId)
    reply.code(201)
    return matchService.toView(match)
  })

  fastify.get<{ Params: { id: string } }>('/matches/:id', async (request, reply) => {
    const match = matchService.getMatch(request.params.id)
    if (!match) {
      reply.code(404)
      return { error: 'match_not_found' }
    }
    return matchService.toView(match)
  })

  fastify.delete<{ Params: { id: string } }>('/matches/:id', async (request, reply) => {
    if (!matchService.cleanupMatch(request.params.id)) {
      reply.code(404)
      return { error: 'match_not_found' }
    }
    return reply.code(204).send()
  })

  fastify.post<{ Params: { id: string }; Body: ThrowBody }>(
    '/matches/:id/throws',
    { schema: throwSchema },
    async (request, reply) => {
      const result = await matchService.throwMove({
        matchId: request.params.id,
        playerId: request.body.playerId,
        move: request.body.move,
        selectionId: request.body.selectionId ?? uuidv4(),
      })

      if (!result.success || !result.round || !result.matchState) {
        const reason = result.reason ?? 'match_not_found'
        reply.code(REJECT_STATUS[reason])
        return { error: reason }
      }

      return {
        round: result.round,
        match: matchService.toView(result.matchState),
      }
    },
  )

  // Debug endpoints (dev only)
  if (config.nodeEnv !== 'production') {
    fastify.get<{ Querystring: { matchId?: string } }>('/debug/match', async (request, reply) => {
      const { matchId } = request.query
      if (!matchId) {
        reply.code(400)
        return { error: 'matchId query parameter required' }
      }

      const match = matchService.getMatch(matchId)
      if (!match) {
        reply.code(404)
        return { error: 'Match not found' }
      }

      return {
        ...matchService.toView(match),
        states: CONCRETE_STATES.map(state => state.label),
        weights: matchService.getWeights(matchId),
      }
    })
  }

  const gameNamespace = fastify.io.of(NAMESPACE)

  gameNamespace.on('connection', (socket: Socket) => {
    const playerId = socket.id // Using socket.id as player ID for simplicity
    log({ evt: 'socket.connect', socketId: socket.id })

    socket.emit('welcome', { message: 'Connected to game server', socketId: socket.id })

    socket.on('startMatch', () => {
      const match = matchService.createMatch(playerId)
      socket.emit('matchStarted', matchService.toView(match))
    })

    socket.on('throwMove', async (data: unknown) => {
      const payload = parseThrowPayload(data)
      if (!payload) {
        const rejected: ThrowRejectedEvent = { matchId: null, reason: 'invalid_payload', selectionId: null }
        socket.emit('throwRejected', rejected)
        return
      }

      const result = await matchService.throwMove({ ...payload, playerId })

      if (!result.success || !result.round || !result.matchState) {
        const rejected: ThrowRejectedEvent = {
          matchId: payload.matchId,
          reason: result.reason ?? 'match_not_found',
          selectionId: payload.selectionId,
        }
        socket.emit('throwRejected', rejected)
        return
      }

      const played: RoundPlayedEvent = {
        matchId: payload.matchId,
        round: result.round,
        match: matchService.toView(result.matchState),
      }
      socket.emit('roundPlayed', played)

      // The service accepts no round after the deciding one, so this fires once
      if (result.matchState.status === 'finished' && result.matchState.result) {
        const finished: MatchFinishedEvent = {
          matchId: payload.matchId,
          result: result.matchState.result,
          score: result.matchState.score,
          rounds: result.matchState.round,
        }
        socket.emit('matchFinished', finished)
      }
    })

    socket.on('ping', () => {
      socket.emit('pong')
    })

    socket.on('disconnect', (reason: string) => {
      for (const match of matchService.getMatchesForPlayer(playerId)) {
        matchService.cleanupMatch(match.id)
      }
      log({ evt: 'socket.disconnect', socketId: socket.id, reason })
    })
  })

  return fastify
}
