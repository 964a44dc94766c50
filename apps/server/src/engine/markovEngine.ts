import {
  ConcreteHistoryState,
  HistoryState,
  LearningRates,
  Move,
  OpponentEngine,
  RandomSource,
  ReinforceOutcome,
  RoundOutcome,
} from './types.js'
import { decide } from './decisionEngine.js'
import { encode } from './historyState.js'
import { evaluate } from './moves.js'
import { mathRandom } from './random.js'
import { WeightMatrix } from './weightMatrix.js'

export interface MarkovEngineOptions {
  learningRates?: Partial<LearningRates>
  random?: RandomSource
}

/**
 * Depth-1 Markov opponent. Owns its weight matrix, so two matches never share
 * learned weights.
 */
export class MarkovOpponentEngine implements OpponentEngine {
  private readonly matrix: WeightMatrix
  private readonly random: RandomSource

  constructor(options: MarkovEngineOptions = {}) {
    this.matrix = new WeightMatrix(options.learningRates)
    this.random = options.random ?? mathRandom
  }

  get learningRates(): LearningRates {
    return { ...this.matrix.rates }
  }

  decide(previous: HistoryState): Move {
    return decide(this.matrix, previous, this.random)
  }

  evaluate(playerMove: Move, computerMove: Move): RoundOutcome {
    return evaluate(playerMove, computerMove)
  }

  encode(playerMove: Move, outcome: RoundOutcome): ConcreteHistoryState {
    return encode(playerMove, outcome)
  }

  reinforce(previous: HistoryState, next: ConcreteHistoryState): ReinforceOutcome {
    return this.matrix.reinforce(previous, next)
  }

  weights(): number[][] {
    return this.matrix.snapshot()
  }
}
