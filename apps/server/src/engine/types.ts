// Core vocabulary for the adaptive opponent. Moves are indexed 0/1/2 so they
// double as column offsets inside the weight matrix.
export const MOVES = [0, 1, 2] as const
export type Move = (typeof MOVES)[number]

export const MOVE_NAMES: Record<Move, string> = {
  0: 'rock',
  1: 'paper',
  2: 'scissors',
}

// Always from the player's side of the table
export type RoundOutcome = 'win' | 'loss' | 'tie'

export const OUTCOMES: readonly RoundOutcome[] = ['win', 'loss', 'tie']

export type StateIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8

export type StateLabel =
  | 'win-rock' | 'win-paper' | 'win-scissors'
  | 'loss-rock' | 'loss-paper' | 'loss-scissors'
  | 'tie-rock' | 'tie-paper' | 'tie-scissors'

export interface EmptyHistoryState {
  kind: 'empty'
}

export interface ConcreteHistoryState {
  kind: 'concrete'
  outcome: RoundOutcome
  move: Move
  index: StateIndex
  label: StateLabel
}

// Empty only exists before the first round and never addresses the matrix
export type HistoryState = EmptyHistoryState | ConcreteHistoryState

export interface LearningRates {
  // Penalty applied to every cell of the touched row
  decreaseValue: number
  // Bonus applied to the observed transition
  increaseValue: number
}

export interface WeightBounds {
  upperLimit: number
  bottomLimit: number
}

export type ReinforceOutcome = 'applied' | 'no_history' | 'upper_limit' | 'bottom_limit'

// Returns a float in [0, 1)
export type RandomSource = () => number

export interface OpponentEngine {
  // Pick the computer's move from the previous round's state
  decide(previous: HistoryState): Move

  // Score a round from the player's point of view
  evaluate(playerMove: Move, computerMove: Move): RoundOutcome

  // Turn a finished round into the state the next decision reads
  encode(playerMove: Move, outcome: RoundOutcome): ConcreteHistoryState

  // Learn the transition previous -> next
  reinforce(previous: HistoryState, next: ConcreteHistoryState): ReinforceOutcome
}
