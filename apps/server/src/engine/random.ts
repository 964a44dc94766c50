import { Move, MOVES, RandomSource } from './types.js'

export const mathRandom: RandomSource = () => Math.random()

/** Seedable PRNG (mulberry32) for reproducible matches and tests */
export function mulberry32(seed: number): RandomSource {
  let s = seed | 0
  return () => {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

export function randomMove(random: RandomSource): Move {
  const draw = random()
  // clamp guards sources that return exactly 1; a non-finite draw counts as 0
  const slot = Number.isFinite(draw) ? Math.min(MOVES.length - 1, Math.floor(draw * MOVES.length)) : 0
  return MOVES[Math.max(0, slot)]
}
