// Build phase for glyph runs
// The builder is mutable; the run it produces is not

import type { Rect, Vector } from '../shared/geometry'
import type { GlyphRunRenderer } from './drawable'
import { GlyphRun, type CharacterSlice, type GlyphRunOptions } from './glyph-run'
import type { GlyphTypeface } from './typeface'

export class GlyphRunBuilder {
  private typeface: GlyphTypeface | null = null
  private fontRenderingEmSize: number | null = null
  private glyphIndices: number[] = []
  private glyphAdvances: number[] = []
  private glyphOffsets: Vector[] = []
  private characters: CharacterSlice | null = null
  private glyphClusters: number[] | null = null
  private biDiLevel: number = 0
  private bounds: Rect | null = null
  private renderer: GlyphRunRenderer | null = null

  setTypeface(typeface: GlyphTypeface, fontRenderingEmSize: number): this {
    this.typeface = typeface
    this.fontRenderingEmSize = fontRenderingEmSize
    return this
  }

  setGlyphs(glyphIndices: ArrayLike<number>, glyphClusters: ArrayLike<number>): this {
    this.glyphIndices = Array.from(glyphIndices)
    this.glyphClusters = Array.from(glyphClusters)
    return this
  }

  setAdvances(glyphAdvances: ArrayLike<number>): this {
    this.glyphAdvances = Array.from(glyphAdvances)
    return this
  }

  setOffsets(glyphOffsets: readonly Vector[]): this {
    this.glyphOffsets = glyphOffsets.slice()
    return this
  }

  /** Characters covered by the run; `length` defaults to the rest of `text` */
  setCharacters(text: string, start: number = 0, length: number = text.length - start): this {
    this.characters = { text, start, length }
    return this
  }

  setBiDiLevel(biDiLevel: number): this {
    this.biDiLevel = biDiLevel
    return this
  }

  setBounds(bounds: Rect): this {
    this.bounds = bounds
    return this
  }

  setRenderer(renderer: GlyphRunRenderer): this {
    this.renderer = renderer
    return this
  }

  // Add one shaped glyph at the end of the run
  addGlyph(glyph: number, cluster: number, advance?: number, offset?: Vector): this {
    const index = this.glyphIndices.length
    if (this.glyphAdvances.length !== (advance === undefined ? 0 : index)) {
      throw new Error(`Glyph ${index}: advances must be given for every glyph or for none`)
    }
    if (this.glyphOffsets.length !== (offset === undefined ? 0 : index)) {
      throw new Error(`Glyph ${index}: offsets must be given for every glyph or for none`)
    }

    const clusters = this.glyphClusters ?? []
    clusters.push(cluster)
    this.glyphClusters = clusters
    this.glyphIndices.push(glyph)
    if (advance !== undefined) this.glyphAdvances.push(advance)
    if (offset !== undefined) this.glyphOffsets.push(offset)
    return this
  }

  /**
   * Validates the collected attributes and produces an immutable run.
   * The builder can keep being used afterwards; the run does not see it.
   */
  build(): GlyphRun {
    if (this.typeface === null || this.fontRenderingEmSize === null) {
      throw new Error('GlyphRunBuilder: typeface is not set')
    }
    if (this.characters === null) {
      throw new Error('GlyphRunBuilder: characters are not set')
    }
    if (this.glyphClusters === null) {
      throw new Error('GlyphRunBuilder: glyph clusters are not set')
    }

    const options: GlyphRunOptions = {
      typeface: this.typeface,
      fontRenderingEmSize: this.fontRenderingEmSize,
      glyphIndices: this.glyphIndices,
      glyphAdvances: this.glyphAdvances,
      glyphOffsets: this.glyphOffsets,
      characters: this.characters,
      glyphClusters: this.glyphClusters,
      biDiLevel: this.biDiLevel,
    }
    if (this.bounds !== null) options.bounds = this.bounds
    if (this.renderer !== null) options.renderer = this.renderer

    return new GlyphRun(options)
  }
}

// One-shot construction from a complete set of attributes
export function createGlyphRun(options: GlyphRunOptions): GlyphRun {
  return new GlyphRun(options)
}
