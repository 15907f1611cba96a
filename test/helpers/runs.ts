import { GlyphRun } from '../../src/glyph-run/glyph-run'
import type { GlyphTypeface } from '../../src/glyph-run/typeface'

// 1000 units per em, glyph g advances (g + 1) * 100 units
export const testTypeface: GlyphTypeface = {
  designEmHeight: 1000,
  ascent: -800,
  descent: 200,
  lineGap: 0,
  glyphAdvance: (glyph) => (glyph + 1) * 100,
}

export interface RunParams {
  text: string
  clusters: number[]
  advances?: number[]
  biDiLevel?: number
  start?: number
}

// One glyph per cluster entry, ids 0..n-1, em size 1000 (scale 1)
export function makeRun({ text, clusters, advances, biDiLevel = 0, start = 0 }: RunParams): GlyphRun {
  return new GlyphRun({
    typeface: testTypeface,
    fontRenderingEmSize: 1000,
    glyphIndices: clusters.map((_, i) => i),
    glyphAdvances: advances ?? clusters.map(() => 10),
    characters: { text, start, length: text.length - start },
    glyphClusters: clusters,
    biDiLevel,
  })
}
