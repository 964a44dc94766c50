export * from './types.js'
export * from './errors.js'
export { assertMove, beats, counter, evaluate, isMove } from './moves.js'
export {
  CONCRETE_STATES,
  EMPTY_STATE,
  describeState,
  encode,
  isStateIndex,
  matrixIndex,
  stateAt,
} from './historyState.js'
export {
  DEFAULT_LEARNING_RATES,
  STATE_COUNT,
  WeightMatrix,
  deriveBounds,
  validateLearningRates,
} from './weightMatrix.js'
export { bucketSums, decide, predictMove, type BucketSums } from './decisionEngine.js'
export { mathRandom, mulberry32, randomMove } from './random.js'
export { MarkovOpponentEngine, type MarkovEngineOptions } from './markovEngine.js'
