import { Move, MOVES, RoundOutcome } from './types.js'
import { InvalidMoveValueError } from './errors.js'

export function isMove(value: unknown): value is Move {
  return typeof value === 'number' && MOVES.some(move => move === value)
}

export function assertMove(value: unknown): Move {
  if (!isMove(value)) {
    throw new InvalidMoveValueError(value)
  }
  return value
}

// v beats (v + 2) mod 3: rock > scissors, paper > rock, scissors > paper
export function beats(a: Move, b: Move): boolean {
  return (a + 2) % 3 === b
}

/** The unique move that beats `move`. */
export function counter(move: Move): Move {
  return MOVES[(assertMove(move) + 1) % 3]
}

/**
 * Decides a single round from the player's side. Shares `beats` with
 * `counter` so the engine's prediction and the scoring agree.
 */
export function evaluate(playerMove: Move, computerMove: Move): RoundOutcome {
  assertMove(playerMove)
  assertMove(computerMove)

  if (playerMove === computerMove) return 'tie'
  return beats(playerMove, computerMove) ? 'win' : 'loss'
}
