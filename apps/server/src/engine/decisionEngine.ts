import { HistoryState, Move, MOVES, RandomSource } from './types.js'
import { CONCRETE_STATES } from './historyState.js'
import { counter } from './moves.js'
import { randomMove } from './random.js'
import { WeightMatrix } from './weightMatrix.js'

export type BucketSums = [number, number, number]

/**
 * Collapses a matrix row into one weight per move by summing the win, loss and
 * tie columns that share it. Which outcome follows does not matter here.
 */
export function bucketSums(row: readonly number[]): BucketSums {
  const sums: BucketSums = [0, 0, 0]
  for (const state of CONCRETE_STATES) {
    sums[state.move] += row[state.index]
  }
  return sums
}

// Argmax; equal sums resolve to the lowest move index
export function predictMove(row: readonly number[]): Move {
  const sums = bucketSums(row)
  let best: Move = MOVES[0]
  for (const move of MOVES) {
    if (sums[move] > sums[best]) best = move
  }
  return best
}

export function decide(matrix: WeightMatrix, previous: HistoryState, random: RandomSource): Move {
  if (previous.kind === 'empty') {
    return randomMove(random)
  }
  return counter(predictMove(matrix.row(previous)))
}
