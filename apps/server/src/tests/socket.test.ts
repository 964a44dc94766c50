import { test, expect, describe, beforeAll, afterAll, afterEach, vi } from 'vitest'
import { FastifyInstance } from 'fastify'
import { io as ioc, Socket as ClientSocket } from 'socket.io-client'
import { buildServer, NAMESPACE, parseThrowPayload } from '../app.js'
import { loadConfig } from '../config.js'
import { silentLogger } from '../logging.js'
import { MatchService } from '../services/matchService.js'
import {
  MatchFinishedEvent,
  MatchView,
  RoundPlayedEvent,
  ThrowRejectedEvent,
  WelcomeEvent,
} from '../types/match.js'

function nextEvent<T>(client: ClientSocket, event: string, timeoutMs = 5000): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeout = setTimeout(() => reject(new Error(`Timed out waiting for ${event}`)), timeoutMs)
    client.once(event, (data: T) => {
      clearTimeout(timeout)
      resolve(data)
    })
  })
}

describe('parseThrowPayload', () => {
  test('accepts a well-formed payload', () => {
    expect(parseThrowPayload({ matchId: 'm', move: 2, selectionId: 's' })).toEqual({ matchId: 'm', move: 2, selectionId: 's' })
  })

  test('rejects anything else', () => {
    expect(parseThrowPayload(null)).toBeNull()
    expect(parseThrowPayload('rock')).toBeNull()
    expect(parseThrowPayload({ matchId: 'm', move: '2', selectionId: 's' })).toBeNull()
    expect(parseThrowPayload({ matchId: 'm', move: 2 })).toBeNull()
  })
})

describe('Socket.IO game namespace', () => {
  let server: FastifyInstance
  let serverURL: string
  let matchService: MatchService
  const connectedSockets: ClientSocket[] = []

  beforeAll(async () => {
    matchService = new MatchService({
      createRandom: () => () => 0,
      logger: silentLogger,
      limits: { scoreLimit: 2 },
    })
    server = await buildServer({
      config: loadConfig({ NODE_ENV: 'test' }),
      matchService,
      logger: silentLogger,
      httpLogging: false,
    })

    await server.listen({ port: 0, host: '127.0.0.1' })

    const address = server.server.address()
    if (address && typeof address === 'object') {
      serverURL = `http://127.0.0.1:${address.port}`
    } else {
      throw new Error('Unable to get server address')
    }
  })

  afterEach(() => {
    for (const socket of connectedSockets) {
      if (socket.connected) {
        socket.disconnect()
      }
    }
    connectedSockets.length = 0
  })

  afterAll(async () => {
    await server.close()
  })

  async function connect(): Promise<{ client: ClientSocket; welcome: WelcomeEvent }> {
    const client = ioc(`${serverURL}${NAMESPACE}`, {
      forceNew: true,
      transports: ['websocket'],
    })
    connectedSockets.push(client)
    const welcome = await nextEvent<WelcomeEvent>(client, 'welcome')
    return { client, welcome }
  }

  test('greets a new connection', async () => {
    const { client, welcome } = await connect()
    expect(welcome.message).toBe('Connected to game server')
    expect(welcome.socketId).toBe(client.id)
  }, 10000)

  test('answers ping with pong', async () => {
    const { client } = await connect()
    const pong = nextEvent<void>(client, 'pong')
    client.emit('ping')
    await expect(pong).resolves.toBeUndefined()
  }, 10000)

  test('plays a match to the score limit', async () => {
    const { client } = await connect()

    const started = nextEvent<MatchView>(client, 'matchStarted')
    client.emit('startMatch')
    const match = await started
    expect(match).toMatchObject({ status: 'active', round: 0, history: 'empty', scoreLimit: 2 })
    expect(match.playerId).toBe(client.id)

    const firstRound = nextEvent<RoundPlayedEvent>(client, 'roundPlayed')
    client.emit('throwMove', { matchId: match.matchId, move: 1, selectionId: 'r1' })
    const first = await firstRound
    expect(first.round).toMatchObject({ round: 1, playerMove: 1, computerMove: 0, outcome: 'win', nextState: 'win-paper' })
    expect(first.match.score).toBe(1)

    const secondRound = nextEvent<RoundPlayedEvent>(client, 'roundPlayed')
    const finished = nextEvent<MatchFinishedEvent>(client, 'matchFinished')
    client.emit('throwMove', { matchId: match.matchId, move: 2, selectionId: 'r2' })

    expect((await secondRound).round).toMatchObject({ round: 2, playerMove: 2, computerMove: 1, outcome: 'win' })
    expect(await finished).toEqual({ matchId: match.matchId, result: 'player', score: 2, rounds: 2 })

    const rejected = nextEvent<ThrowRejectedEvent>(client, 'throwRejected')
    client.emit('throwMove', { matchId: match.matchId, move: 0, selectionId: 'r3' })
    expect(await rejected).toEqual({ matchId: match.matchId, reason: 'match_finished', selectionId: 'r3' })
  }, 10000)

  test('rejects malformed throws', async () => {
    const { client } = await connect()

    const rejected = nextEvent<ThrowRejectedEvent>(client, 'throwRejected')
    client.emit('throwMove', { move: 'rock' })
    expect(await rejected).toEqual({ matchId: null, reason: 'invalid_payload', selectionId: null })
  }, 10000)

  test('rejects throws into another socket\'s match', async () => {
    const owner = await connect()
    const other = await connect()

    const started = nextEvent<MatchView>(owner.client, 'matchStarted')
    owner.client.emit('startMatch')
    const match = await started

    const rejected = nextEvent<ThrowRejectedEvent>(other.client, 'throwRejected')
    other.client.emit('throwMove', { matchId: match.matchId, move: 0, selectionId: 'x' })
    expect(await rejected).toEqual({ matchId: match.matchId, reason: 'not_your_match', selectionId: 'x' })
  }, 10000)

  test('cleans up matches when the socket disconnects', async () => {
    const { client } = await connect()

    const started = nextEvent<MatchView>(client, 'matchStarted')
    client.emit('startMatch')
    const match = await started
    expect(matchService.getMatch(match.matchId)).toBeDefined()

    client.disconnect()

    await vi.waitFor(() => {
      expect(matchService.getMatch(match.matchId)).toBeUndefined()
    }, { timeout: 5000 })
  }, 10000)
})
