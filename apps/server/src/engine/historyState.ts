import {
  ConcreteHistoryState,
  EmptyHistoryState,
  HistoryState,
  Move,
  MOVE_NAMES,
  MOVES,
  OUTCOMES,
  RoundOutcome,
  StateIndex,
  StateLabel,
} from './types.js'
import { InvalidStateIndexError } from './errors.js'
import { assertMove } from './moves.js'

export const EMPTY_STATE: EmptyHistoryState = Object.freeze({ kind: 'empty' })

const STATE_INDICES: readonly StateIndex[] = [0, 1, 2, 3, 4, 5, 6, 7, 8]

const OUTCOME_BLOCK: Record<RoundOutcome, number> = { win: 0, loss: 1, tie: 2 }

function labelFor(outcome: RoundOutcome, move: Move): StateLabel {
  switch (move) {
    case 0:
      return `${outcome}-rock`
    case 1:
      return `${outcome}-paper`
    case 2:
      return `${outcome}-scissors`
  }
}

/*
 * Row/column order of the weight matrix:
 *   0 win-rock   1 win-paper   2 win-scissors
 *   3 loss-rock  4 loss-paper  5 loss-scissors
 *   6 tie-rock   7 tie-paper   8 tie-scissors
 */
export const CONCRETE_STATES: readonly ConcreteHistoryState[] = OUTCOMES.flatMap(outcome =>
  MOVES.map(move => Object.freeze({
    kind: 'concrete' as const,
    outcome,
    move,
    index: STATE_INDICES[OUTCOME_BLOCK[outcome] * 3 + move],
    label: labelFor(outcome, move),
  }))
)

export function isStateIndex(value: unknown): value is StateIndex {
  return typeof value === 'number' && STATE_INDICES.some(index => index === value)
}

export function stateAt(index: number): ConcreteHistoryState {
  if (!isStateIndex(index)) {
    throw new InvalidStateIndexError(index)
  }
  return CONCRETE_STATES[index]
}

/**
 * Matrix coordinate for a state. Throws for Empty and for forged states whose
 * index falls outside 0..8.
 */
export function matrixIndex(state: HistoryState): StateIndex {
  if (state.kind !== 'concrete' || !isStateIndex(state.index)) {
    throw new InvalidStateIndexError(state.kind === 'concrete' ? state.index : state.kind)
  }
  return state.index
}

export function encode(playerMove: Move, outcome: RoundOutcome): ConcreteHistoryState {
  const move = assertMove(playerMove)
  return CONCRETE_STATES[OUTCOME_BLOCK[outcome] * 3 + move]
}

export function describeState(state: HistoryState): string {
  if (state.kind === 'empty') return 'empty'
  return `${state.label} (${state.outcome} with ${MOVE_NAMES[state.move]})`
}
