// Platform drawable produced once per glyph run

import type { GlyphRun } from './glyph-run'

export interface GlyphRunDrawable {
  dispose(): void
}

export interface MaterializedDrawable {
  readonly handle: GlyphRunDrawable
  /** Width the platform measured while building the drawable. */
  readonly measuredWidth: number
}

export interface GlyphRunRenderer {
  createDrawable(run: GlyphRun): MaterializedDrawable
}
