import { LearningRates, DEFAULT_LEARNING_RATES, validateLearningRates } from './engine/index.js'

export interface MatchLimits {
  maxRounds: number
  scoreLimit: number
}

export interface ServerConfig {
  port: number
  host: string
  nodeEnv: string
  logLevel: string
  learningRates: LearningRates
  limits: MatchLimits
  randomSeed: number | null
}

export const DEFAULT_MATCH_LIMITS: MatchLimits = {
  maxRounds: 30,
  scoreLimit: 10,
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name]
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected an integer >= ${min}, got "${raw}"`)
  }
  return value
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw === '') return fallback
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name}: expected a number, got "${raw}"`)
  }
  return value
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv = env.NODE_ENV || 'production'
  const isDevelopment = nodeEnv === 'development'

  const learningRates = validateLearningRates({
    decreaseValue: readNumber(env, 'DECREASE_VALUE', DEFAULT_LEARNING_RATES.decreaseValue),
    increaseValue: readNumber(env, 'INCREASE_VALUE', DEFAULT_LEARNING_RATES.increaseValue),
  })

  return {
    port: readInt(env, 'PORT', isDevelopment ? 8890 : 9001, 0),
    host: env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: env.LOG_LEVEL || (isDevelopment ? 'info' : 'warn'),
    learningRates,
    limits: {
      maxRounds: readInt(env, 'MAX_ROUNDS', DEFAULT_MATCH_LIMITS.maxRounds, 1),
      scoreLimit: readInt(env, 'SCORE_LIMIT', DEFAULT_MATCH_LIMITS.scoreLimit, 1),
    },
    randomSeed: env.RANDOM_SEED ? readInt(env, 'RANDOM_SEED', 0, 0) : null,
  }
}
