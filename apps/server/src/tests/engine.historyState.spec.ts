import { describe, it, expect } from 'vitest'
import {
  CONCRETE_STATES,
  EMPTY_STATE,
  InvalidStateIndexError,
  MOVES,
  OUTCOMES,
  describeState,
  encode,
  matrixIndex,
  stateAt,
} from '../engine/index.js'

describe('History states', () => {
  it('orders the nine concrete states win, loss, tie by move', () => {
    expect(CONCRETE_STATES.map(state => state.label)).toEqual([
      'win-rock', 'win-paper', 'win-scissors',
      'loss-rock', 'loss-paper', 'loss-scissors',
      'tie-rock', 'tie-paper', 'tie-scissors',
    ])
    CONCRETE_STATES.forEach((state, i) => {
      expect(state.index).toBe(i)
      expect(state.kind).toBe('concrete')
    })
  })

  it('encodes (move, outcome) into the matching state', () => {
    expect(encode(0, 'win').label).toBe('win-rock')
    expect(encode(1, 'win').index).toBe(1)
    expect(encode(2, 'loss').index).toBe(5)
    expect(encode(0, 'tie').index).toBe(6)
    expect(encode(2, 'tie')).toEqual({ kind: 'concrete', outcome: 'tie', move: 2, index: 8, label: 'tie-scissors' })
  })

  it('maps the nine inputs onto the nine states one to one', () => {
    const seen = new Set<number>()
    for (const outcome of OUTCOMES) {
      for (const move of MOVES) {
        const state = encode(move, outcome)
        expect(state.outcome).toBe(outcome)
        expect(state.move).toBe(move)
        expect(encode(move, outcome)).toBe(state)
        seen.add(state.index)
      }
    }
    expect(seen.size).toBe(9)
  })

  it('never produces the empty state', () => {
    for (const outcome of OUTCOMES) {
      for (const move of MOVES) {
        expect(encode(move, outcome).kind).not.toBe('empty')
      }
    }
  })

  it('looks states up by index', () => {
    expect(stateAt(4).label).toBe('loss-paper')
    expect(() => stateAt(9)).toThrow(InvalidStateIndexError)
    expect(() => stateAt(-1)).toThrow(InvalidStateIndexError)
    expect(() => stateAt(2.5)).toThrow('History state index must be 0..8, got 2.5')
  })

  it('refuses to use the empty state as a matrix coordinate', () => {
    expect(() => matrixIndex(EMPTY_STATE)).toThrow(InvalidStateIndexError)
    expect(matrixIndex(stateAt(7))).toBe(7)
  })

  it('refuses a forged state with an out-of-range index', () => {
    const forged = JSON.parse('{"kind":"concrete","outcome":"win","move":0,"index":12,"label":"win-rock"}')
    expect(() => matrixIndex(forged)).toThrow(InvalidStateIndexError)
  })

  it('describes states for display', () => {
    expect(describeState(EMPTY_STATE)).toBe('empty')
    expect(describeState(stateAt(3))).toBe('loss-rock (loss with rock)')
  })
})
