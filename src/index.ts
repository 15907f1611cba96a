// Glyph runs
export { GlyphRun, type GlyphRunOptions, type CharacterSlice, type NearestCharacterHit, type DistanceHit } from './glyph-run/glyph-run'
export { GlyphRunBuilder, createGlyphRun } from './glyph-run/builder'
export {
  characterHit,
  leadingEdge,
  caretIndex,
  characterHitsEqual,
  type CharacterHit,
} from './glyph-run/character-hit'
export type { GlyphTypeface } from './glyph-run/typeface'
export type { GlyphRunRenderer, GlyphRunDrawable, MaterializedDrawable } from './glyph-run/drawable'
export type { Rect, Vector } from './shared/geometry'
