import { bench, describe } from 'vitest'
import { GlyphRun } from '../src/glyph-run/glyph-run'
import { characterHit } from '../src/glyph-run/character-hit'
import type { GlyphTypeface } from '../src/glyph-run/typeface'

const typeface: GlyphTypeface = {
  designEmHeight: 2048,
  ascent: -1638,
  descent: 410,
  lineGap: 0,
  glyphAdvance: (glyph) => 1000 + (glyph % 7) * 50,
}

// Every third character is a combining mark sharing its base's cluster
function makeLongRun(length: number, biDiLevel: number): GlyphRun {
  const clusters: number[] = []
  for (let i = 0; i < length; i++) {
    if (i % 3 !== 2) clusters.push(i)
  }
  if (biDiLevel % 2 === 1) clusters.reverse()

  return new GlyphRun({
    typeface,
    fontRenderingEmSize: 16,
    glyphIndices: clusters.map((c) => c % 500),
    characters: { text: 'x'.repeat(length), start: 0, length },
    glyphClusters: clusters,
    biDiLevel,
  })
}

const sizes = [100, 10_000, 60_000] as const

for (const size of sizes) {
  const ltr = makeLongRun(size, 0)
  const rtl = makeLongRun(size, 1)
  const middle = Math.floor(size / 2)

  describe(`${size} characters`, () => {
    bench('findGlyphIndex (LTR)', () => {
      ltr.findGlyphIndex(middle)
      ltr.findGlyphIndex(middle + 1)
    })

    bench('findGlyphIndex (RTL)', () => {
      rtl.findGlyphIndex(middle)
      rtl.findGlyphIndex(middle + 1)
    })

    bench('getDistanceFromCharacterHit', () => {
      ltr.getDistanceFromCharacterHit(characterHit(middle))
    })

    bench('getCharacterHitFromDistance', () => {
      ltr.getCharacterHitFromDistance(ltr.bounds.width / 2)
    })
  })
}
