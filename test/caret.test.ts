import { describe, it, expect } from 'vitest'
import { characterHit, characterHitsEqual, type CharacterHit } from '../src/glyph-run/character-hit'
import type { GlyphRun } from '../src/glyph-run/glyph-run'
import { makeRun } from './helpers/runs'

// Follow navigation until it returns its input, collecting every hit on the way.
// Each cluster takes two stops, its leading and its trailing edge.
function walk(run: GlyphRun, from: CharacterHit, step: (hit: CharacterHit) => CharacterHit): CharacterHit[] {
  const hits = [from]
  let current = from
  for (let i = 0; i <= 2 * run.characters.length; i++) {
    const next = step(current)
    if (characterHitsEqual(next, current)) return hits
    hits.push(next)
    current = next
  }
  throw new Error('navigation did not stop')
}

describe('caret navigation - next', () => {
  it('alternates leading and trailing edges in a simple run', () => {
    const run = makeRun({ text: 'abcd', clusters: [0, 1, 2, 3] })
    expect(walk(run, characterHit(0), (h) => run.getNextCaretCharacterHit(h))).toEqual([
      characterHit(0),
      characterHit(0, 1),
      characterHit(1),
      characterHit(1, 1),
      characterHit(2),
      characterHit(2, 1),
      characterHit(3),
      characterHit(3, 1),
    ])
  })

  it('moves a trailing hit to the leading edge of the next cluster', () => {
    const run = makeRun({ text: 'abcd', clusters: [0, 1, 2, 3] })
    expect(run.getNextCaretCharacterHit(characterHit(0, 1))).toEqual(characterHit(1))
  })

  it('steps over a ligature in one call', () => {
    const run = makeRun({ text: 'fi', clusters: [0], advances: [18] })
    expect(run.getNextCaretCharacterHit(characterHit(0))).toEqual(characterHit(0, 2))
    expect(run.getNextCaretCharacterHit(characterHit(0, 2))).toEqual(characterHit(0, 2))
  })

  it('steps over a combining sequence', () => {
    const run = makeRun({ text: 'e\u0301x', clusters: [0, 2] })
    expect(run.getNextCaretCharacterHit(characterHit(0))).toEqual(characterHit(0, 2))
    expect(run.getNextCaretCharacterHit(characterHit(0, 2))).toEqual(characterHit(2))
  })

  it('moves in logical order in a right-to-left run', () => {
    const run = makeRun({ text: 'אב', clusters: [1, 0], biDiLevel: 1 })
    expect(walk(run, characterHit(0), (h) => run.getNextCaretCharacterHit(h))).toEqual([
      characterHit(0),
      characterHit(0, 1),
      characterHit(1),
      characterHit(1, 1),
    ])
  })
})

describe('caret navigation - previous', () => {
  it('alternates trailing and leading edges in a simple run', () => {
    const run = makeRun({ text: 'abcd', clusters: [0, 1, 2, 3] })
    expect(walk(run, characterHit(3, 1), (h) => run.getPreviousCaretCharacterHit(h))).toEqual([
      characterHit(3, 1),
      characterHit(3),
      characterHit(2, 1),
      characterHit(2),
      characterHit(1, 1),
      characterHit(1),
      characterHit(0, 1),
      characterHit(0),
    ])
  })

  it('moves a leading hit to the trailing edge of the previous cluster', () => {
    const run = makeRun({ text: 'abcd', clusters: [0, 1, 2, 3] })
    expect(run.getPreviousCaretCharacterHit(characterHit(3))).toEqual(characterHit(2, 1))
  })

  it('skips a combining mark back to its base', () => {
    const run = makeRun({ text: 'e\u0301x', clusters: [0, 2] })
    expect(run.getPreviousCaretCharacterHit(characterHit(2))).toEqual(characterHit(0, 2))
    expect(run.getPreviousCaretCharacterHit(characterHit(0, 2))).toEqual(characterHit(0))
  })

  it('stops at the start of an offset character range', () => {
    const run = makeRun({ text: 'xyabc', clusters: [2, 3, 4], start: 2 })
    expect(run.getPreviousCaretCharacterHit(characterHit(2))).toEqual(characterHit(2))
    expect(run.getPreviousCaretCharacterHit(characterHit(3))).toEqual(characterHit(2, 1))
  })
})

describe('caret navigation - termination', () => {
  const runs: Array<[string, GlyphRun]> = [
    ['simple', makeRun({ text: 'abcd', clusters: [0, 1, 2, 3] })],
    ['clustered', makeRun({ text: 'abcdef', clusters: [0, 0, 1, 3, 3, 4] })],
    ['trailing marks', makeRun({ text: 'ab\u0301\u0302', clusters: [0, 1] })],
    ['right-to-left', makeRun({ text: 'abcde', clusters: [4, 3, 1, 1, 0], biDiLevel: 1 })],
  ]

  for (const [name, run] of runs) {
    it(`reaches a fixed point in both directions (${name})`, () => {
      const forward = walk(run, characterHit(run.characters.start), (h) => run.getNextCaretCharacterHit(h))
      const last = forward[forward.length - 1]
      const backward = walk(run, last, (h) => run.getPreviousCaretCharacterHit(h))

      expect(forward.length).toBeLessThanOrEqual(2 * run.characters.length + 1)
      expect(last.firstCharacterIndex + last.trailingLength).toBe(run.characterEnd)
      expect(backward[backward.length - 1]).toEqual(characterHit(run.characters.start))
    })
  }
})
