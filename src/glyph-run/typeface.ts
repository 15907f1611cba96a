/**
 * Font face metrics a glyph run needs, in font design units.
 *
 * Vertical metrics use a y-down convention: `ascent` is negative and
 * `descent` positive, so `descent - ascent + lineGap` is the line height.
 */
export interface GlyphTypeface {
  readonly designEmHeight: number
  readonly ascent: number
  readonly descent: number
  readonly lineGap: number
  glyphAdvance(glyph: number): number
}
