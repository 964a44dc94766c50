import { Mutex } from 'async-mutex'
import { v4 as uuidv4 } from 'uuid'
import {
  EMPTY_STATE,
  HistoryState,
  LearningRates,
  MarkovOpponentEngine,
  RandomSource,
  RoundOutcome,
  isMove,
  mathRandom,
} from '../engine/index.js'
import { DEFAULT_MATCH_LIMITS, MatchLimits } from '../config.js'
import { EventLogger, jsonLogger } from '../logging.js'
import {
  MatchResult,
  MatchStatus,
  MatchView,
  RoundRecord,
  ThrowRejectReason,
} from '../types/match.js'

export interface MatchState {
  id: string
  playerId: string
  history: HistoryState // state of the previous round, Empty before round 1
  round: number
  score: number
  wins: number
  losses: number
  ties: number
  rounds: RoundRecord[]
  status: MatchStatus
  result: MatchResult | null
  startedAt: Date
  finishedAt?: Date
}

export interface ThrowRequest {
  matchId: string
  playerId: string
  move: unknown
  selectionId: string
}

export interface ThrowResult {
  success: boolean
  reason?: ThrowRejectReason
  round?: RoundRecord
  matchState?: MatchState
}

export interface MatchServiceOptions {
  limits?: Partial<MatchLimits>
  learningRates?: Partial<LearningRates>
  // Called once per match so each engine draws from its own stream
  createRandom?: () => RandomSource
  logger?: EventLogger
}

// Per-match state needed only while the match is still being played
interface LiveMatch {
  engine: MarkovOpponentEngine
  mutex: Mutex
  selections: Set<string>
}

const SCORE_DELTA: Record<RoundOutcome, number> = { win: 1, loss: -1, tie: 0 }

export class MatchService {
  private matches = new Map<string, MatchState>()
  private live = new Map<string, LiveMatch>()
  private readonly limits: MatchLimits
  private readonly learningRates: Partial<LearningRates>
  private readonly createRandom: () => RandomSource
  private readonly log: EventLogger

  constructor(options: MatchServiceOptions = {}) {
    this.limits = { ...DEFAULT_MATCH_LIMITS, ...options.limits }
    this.learningRates = options.learningRates ?? {}
    this.createRandom = options.createRandom ?? (() => mathRandom)
    this.log = options.logger ?? jsonLogger
  }

  getLimits(): MatchLimits {
    return { ...this.limits }
  }

  createMatch(playerId: string): MatchState {
    const matchId = `match_${Date.now()}_${uuidv4()}`

    const engine = new MarkovOpponentEngine({
      learningRates: this.learningRates,
      random: this.createRandom(),
    })

    const match: MatchState = {
      id: matchId,
      playerId,
      history: EMPTY_STATE,
      round: 0,
      score: 0,
      wins: 0,
      losses: 0,
      ties: 0,
      rounds: [],
      status: 'active',
      result: null,
      startedAt: new Date(),
      finishedAt: undefined,
    }

    this.matches.set(matchId, match)
    this.live.set(matchId, { engine, mutex: new Mutex(), selections: new Set() })

    this.log({
      evt: 'match.init',
      matchId,
      playerId,
      maxRounds: this.limits.maxRounds,
      scoreLimit: this.limits.scoreLimit,
      ...engine.learningRates,
    })
    return match
  }

  /**
   * Plays one round: the engine commits to its move from the previous state
   * before looking at the player's throw, then learns from the round.
   */
  async throwMove(request: ThrowRequest): Promise<ThrowResult> {
    const { matchId, playerId, move, selectionId } = request

    const match = this.matches.get(matchId)
    if (!match) {
      return this.reject(matchId, 'match_not_found')
    }

    const live = this.live.get(matchId)
    if (!live) {
      // Finished matches keep only their record
      return this.reject(matchId, match.playerId !== playerId ? 'not_your_match' : 'match_finished')
    }
    const { engine, mutex, selections } = live

    return await mutex.runExclusive(async () => {
      if (match.playerId !== playerId) {
        return this.reject(matchId, 'not_your_match')
      }

      // Exactly-once result: no rounds after the match is decided
      if (match.status !== 'active') {
        return this.reject(matchId, 'match_finished')
      }

      if (selections.has(selectionId)) {
        return this.reject(matchId, 'duplicate_selection')
      }

      if (!isMove(move)) {
        return this.reject(matchId, 'invalid_move')
      }

      const previous = match.history
      const computerMove = engine.decide(previous)
      const outcome = engine.evaluate(move, computerMove)
      const next = engine.encode(move, outcome)
      const reinforcement = engine.reinforce(previous, next)

      match.history = next
      match.round++
      match.score += SCORE_DELTA[outcome]
      if (outcome === 'win') match.wins++
      else if (outcome === 'loss') match.losses++
      else match.ties++
      selections.add(selectionId)

      const round: RoundRecord = {
        round: match.round,
        playerMove: move,
        computerMove,
        outcome,
        previousState: previous.kind === 'empty' ? 'empty' : previous.label,
        nextState: next.label,
        reinforcement,
        scoreAfter: match.score,
        selectionId,
        timestamp: new Date(),
      }
      match.rounds.push(round)

      this.log({
        evt: 'round.played',
        matchId,
        round: round.round,
        playerMove: move,
        computerMove,
        outcome,
        previousState: round.previousState,
        nextState: round.nextState,
        reinforcement,
        score: match.score,
      })

      if (this.isDecided(match)) {
        match.status = 'finished'
        match.result = match.score > 0 ? 'player' : match.score < 0 ? 'computer' : 'tie'
        match.finishedAt = new Date()
        // Throws queued on the mutex still see the finished status
        this.live.delete(matchId)
        this.log({
          evt: 'match.finished',
          matchId,
          result: match.result,
          score: match.score,
          rounds: match.round,
        })
      }

      return {
        success: true,
        round,
        matchState: { ...match, rounds: [...match.rounds] },
      }
    })
  }

  private isDecided(match: MatchState): boolean {
    return (
      match.round >= this.limits.maxRounds ||
      match.score >= this.limits.scoreLimit ||
      match.score <= -this.limits.scoreLimit
    )
  }

  private reject(matchId: string, reason: ThrowRejectReason): ThrowResult {
    this.log({ evt: 'round.rejected', matchId, reason })
    return { success: false, reason }
  }

  getMatch(matchId: string): MatchState | undefined {
    return this.matches.get(matchId)
  }

  getWeights(matchId: string): number[][] | undefined {
    return this.live.get(matchId)?.engine.weights()
  }

  toView(match: MatchState): MatchView {
    return {
      matchId: match.id,
      playerId: match.playerId,
      status: match.status,
      round: match.round,
      maxRounds: this.limits.maxRounds,
      score: match.score,
      scoreLimit: this.limits.scoreLimit,
      wins: match.wins,
      losses: match.losses,
      ties: match.ties,
      history: match.history.kind === 'empty' ? 'empty' : match.history.label,
      result: match.result,
      rounds: [...match.rounds],
      startedAt: match.startedAt,
      finishedAt: match.finishedAt,
    }
  }

  /** Drops the match and anything still held for it; false when it was unknown */
  cleanupMatch(matchId: string): boolean {
    const match = this.matches.get(matchId)
    if (!match) return false

    this.matches.delete(matchId)
    this.live.delete(matchId)

    this.log({
      evt: 'match.cleanup',
      matchId,
      playerId: match.playerId,
    })
    return true
  }

  /** Matches still holding an engine, i.e. not yet finished */
  getLiveMatchCount(): number {
    return this.live.size
  }

  getActiveMatchCount(): number {
    return this.getActiveMatches().length
  }

  getFinishedMatchCount(): number {
    return Array.from(this.matches.values()).filter(m => m.status === 'finished').length
  }

  getActiveMatches(): MatchState[] {
    return Array.from(this.matches.values()).filter(m => m.status === 'active')
  }

  getMatchesForPlayer(playerId: string): MatchState[] {
    return Array.from(this.matches.values()).filter(m => m.playerId === playerId)
  }
}
