import { ConcreteHistoryState, HistoryState, LearningRates, ReinforceOutcome, WeightBounds } from './types.js'
import { matrixIndex } from './historyState.js'

export const STATE_COUNT = 9

export const DEFAULT_LEARNING_RATES: LearningRates = {
  decreaseValue: 0.01,
  increaseValue: 0.1,
}

export function deriveBounds(rates: LearningRates): WeightBounds {
  return {
    upperLimit: 1 - rates.increaseValue + rates.decreaseValue,
    bottomLimit: rates.decreaseValue,
  }
}

export function validateLearningRates(rates: LearningRates): LearningRates {
  const { decreaseValue, increaseValue } = rates
  if (!Number.isFinite(decreaseValue) || decreaseValue <= 0) {
    throw new RangeError(`decreaseValue must be a positive number, got ${decreaseValue}`)
  }
  if (!Number.isFinite(increaseValue) || increaseValue <= 0 || increaseValue > 1) {
    throw new RangeError(`increaseValue must be in (0, 1], got ${increaseValue}`)
  }
  const { upperLimit, bottomLimit } = deriveBounds(rates)
  if (bottomLimit >= upperLimit) {
    throw new RangeError(`Learning rates leave no room to update: bottom ${bottomLimit} >= upper ${upperLimit}`)
  }
  return { decreaseValue, increaseValue }
}

/**
 * 9×9 table of evidence for "state A is followed by state B". One row per
 * previous state, one column per next state.
 *
 * Weights start at 1/9 and are never renormalised: an applied update moves the
 * row sum by `increaseValue - 8 * decreaseValue`. The guard in `reinforce`
 * keeps every cell inside [0, 1].
 */
export class WeightMatrix {
  readonly rates: LearningRates
  readonly bounds: WeightBounds
  private readonly cells: number[][]

  constructor(rates: Partial<LearningRates> = {}) {
    this.rates = validateLearningRates({ ...DEFAULT_LEARNING_RATES, ...rates })
    this.bounds = deriveBounds(this.rates)
    this.cells = Array.from({ length: STATE_COUNT }, () => Array<number>(STATE_COUNT).fill(1 / STATE_COUNT))
  }

  row(state: ConcreteHistoryState): readonly number[] {
    return [...this.cells[matrixIndex(state)]]
  }

  get(from: ConcreteHistoryState, to: ConcreteHistoryState): number {
    return this.cells[matrixIndex(from)][matrixIndex(to)]
  }

  snapshot(): number[][] {
    return this.cells.map(row => [...row])
  }

  /**
   * Nudges the row of `previous` toward `observed`. When the observed cell is
   * above the upper limit, or any cell in the row is below the bottom limit,
   * the entire row is left as is for this round.
   */
  reinforce(previous: HistoryState, observed: ConcreteHistoryState): ReinforceOutcome {
    if (previous.kind === 'empty') {
      return 'no_history'
    }

    const row = this.cells[matrixIndex(previous)]
    const target = matrixIndex(observed)

    if (row[target] > this.bounds.upperLimit) {
      return 'upper_limit'
    }
    if (Math.min(...row) < this.bounds.bottomLimit) {
      return 'bottom_limit'
    }

    for (let i = 0; i < row.length; i++) {
      row[i] -= this.rates.decreaseValue
    }
    row[target] += this.rates.increaseValue
    return 'applied'
  }
}
