import { Move, ReinforceOutcome, RoundOutcome, StateLabel } from '../engine/index.js'

export type MatchStatus = 'active' | 'finished'
export type MatchResult = 'player' | 'computer' | 'tie'

export type ThrowRejectReason =
  | 'match_not_found'
  | 'not_your_match'
  | 'match_finished'
  | 'duplicate_selection'
  | 'invalid_move'

export interface RoundRecord {
  round: number // 1-based
  playerMove: Move
  computerMove: Move
  outcome: RoundOutcome
  previousState: StateLabel | 'empty'
  nextState: StateLabel
  reinforcement: ReinforceOutcome
  scoreAfter: number
  selectionId: string
  timestamp: Date
}

// Wire shape of a match: plain data, no engine
export interface MatchView {
  matchId: string
  playerId: string
  status: MatchStatus
  round: number
  maxRounds: number
  score: number
  scoreLimit: number
  wins: number
  losses: number
  ties: number
  history: StateLabel | 'empty'
  result: MatchResult | null
  rounds: RoundRecord[]
  startedAt: Date
  finishedAt?: Date
}

export interface RoundPlayedEvent {
  matchId: string
  round: RoundRecord
  match: MatchView
}

export interface MatchFinishedEvent {
  matchId: string
  result: MatchResult
  score: number
  rounds: number
}

export interface ThrowRejectedEvent {
  matchId: string | null
  reason: ThrowRejectReason | 'invalid_payload'
  selectionId: string | null
}

export interface WelcomeEvent {
  message: string
  socketId: string
}

export interface ThrowMovePayload {
  matchId: string
  move: number
  selectionId: string
}

// Socket event types
export interface ServerToClientEvents {
  welcome: (data: WelcomeEvent) => void
  matchStarted: (match: MatchView) => void
  roundPlayed: (data: RoundPlayedEvent) => void
  matchFinished: (data: MatchFinishedEvent) => void
  throwRejected: (data: ThrowRejectedEvent) => void
  pong: () => void
}

export interface ClientToServerEvents {
  startMatch: () => void
  throwMove: (data: ThrowMovePayload) => void
  ping: () => void
}
