// Shaped glyph run: character/glyph mapping, hit-testing and caret stops

import { lowerBound, type SortOrder } from '../shared/binary-search'
import type { Rect, Vector } from '../shared/geometry'
import { caretIndex, characterHit, leadingEdge, type CharacterHit } from './character-hit'
import type { GlyphRunRenderer, MaterializedDrawable } from './drawable'
import type { GlyphTypeface } from './typeface'
import { validateGlyphRunOptions } from './validate'

/** UTF-16 text covered by a run; cluster values index into `text`. */
export interface CharacterSlice {
  readonly text: string
  readonly start: number
  readonly length: number
}

export interface GlyphRunOptions {
  typeface: GlyphTypeface
  fontRenderingEmSize: number
  glyphIndices: ArrayLike<number>
  /** Empty or omitted: advances come from the typeface metrics */
  glyphAdvances?: ArrayLike<number>
  glyphOffsets?: readonly Vector[]
  characters: CharacterSlice
  glyphClusters: ArrayLike<number>
  /** Even = left-to-right, odd = right-to-left */
  biDiLevel?: number
  /** Precomputed bounds, used as given */
  bounds?: Rect
  renderer?: GlyphRunRenderer
}

export interface NearestCharacterHit {
  characterHit: CharacterHit
  /** Summed advance of every glyph in the hit's cluster */
  width: number
}

export interface DistanceHit {
  characterHit: CharacterHit
  isInside: boolean
}

export class GlyphRun {
  readonly typeface: GlyphTypeface
  readonly fontRenderingEmSize: number
  readonly glyphIndices: readonly number[]
  readonly glyphAdvances: readonly number[]
  readonly glyphOffsets: readonly Vector[]
  readonly characters: CharacterSlice
  readonly glyphClusters: readonly number[]
  readonly biDiLevel: number
  readonly scale: number
  readonly isLeftToRight: boolean

  private readonly order: SortOrder
  private readonly renderer: GlyphRunRenderer | null
  private cachedBounds: Rect | null
  private materialized: MaterializedDrawable | null = null
  private disposed: boolean = false

  constructor(options: GlyphRunOptions) {
    validateGlyphRunOptions(options)

    this.typeface = options.typeface
    this.fontRenderingEmSize = options.fontRenderingEmSize
    this.glyphIndices = Object.freeze(Array.from(options.glyphIndices))
    this.glyphAdvances = Object.freeze(Array.from(options.glyphAdvances ?? []))
    this.glyphOffsets = Object.freeze((options.glyphOffsets ?? []).map(({ x, y }) => Object.freeze({ x, y })))
    this.characters = Object.freeze({ ...options.characters })
    this.glyphClusters = Object.freeze(Array.from(options.glyphClusters))
    this.biDiLevel = options.biDiLevel ?? 0
    this.scale = this.fontRenderingEmSize / this.typeface.designEmHeight
    this.isLeftToRight = (this.biDiLevel & 1) === 0
    this.order = this.isLeftToRight ? 'ascending' : 'descending'
    this.renderer = options.renderer ?? null
    this.cachedBounds = options.bounds ? Object.freeze({ ...options.bounds }) : null
  }

  get glyphCount(): number {
    return this.glyphIndices.length
  }

  // Exclusive end of the covered character range
  get characterEnd(): number {
    return this.characters.start + this.characters.length
  }

  get bounds(): Rect {
    if (this.cachedBounds === null) {
      this.cachedBounds = this.calculateBounds()
    }
    return this.cachedBounds
  }

  get hasDrawable(): boolean {
    return this.materialized !== null
  }

  /**
   * Platform drawable for this run, created through the renderer on first
   * access and reused afterwards.
   */
  get drawable(): MaterializedDrawable {
    if (this.disposed) {
      throw new Error('GlyphRun has been disposed')
    }
    if (this.materialized === null) {
      if (this.renderer === null) {
        throw new Error('GlyphRun was built without a renderer')
      }
      this.materialized = this.renderer.createDrawable(this)
    }
    return this.materialized
  }

  // Safe to call repeatedly, and when no drawable was created
  dispose(): void {
    this.disposed = true
    const materialized = this.materialized
    this.materialized = null
    materialized?.handle.dispose()
  }

  // Supplied advance, or the typeface's scaled by the em size
  glyphAdvanceAt(glyphIndex: number): number {
    if (this.glyphAdvances.length > 0) {
      return this.glyphAdvances[glyphIndex]
    }
    return this.typeface.glyphAdvance(this.glyphIndices[glyphIndex]) * this.scale
  }

  /**
   * Finds the first glyph of the cluster that renders `characterIndex`.
   *
   * Characters before the run clamp to glyph 0 and characters past it map
   * to `glyphCount`; the two are swapped for right-to-left runs, whose
   * clusters are stored in descending character order. `null` means no
   * glyph covers the position.
   */
  findGlyphIndex(characterIndex: number): number | null {
    const clusters = this.glyphClusters
    const first = clusters[0]
    const last = clusters[clusters.length - 1]

    if (this.isLeftToRight) {
      if (characterIndex < first) return 0
      if (characterIndex > last) return this.glyphCount
    } else {
      if (characterIndex < last) return this.glyphCount
      if (characterIndex > first) return 0
    }

    // Position holding the greatest cluster value <= characterIndex, so a
    // combining character without a cluster of its own maps to its base
    const match = this.isLeftToRight
      ? lowerBound(clusters, characterIndex + 1, this.order) - 1
      : lowerBound(clusters, characterIndex, this.order)
    if (match < 0 || match >= clusters.length) return null

    return lowerBound(clusters, clusters[match], this.order)
  }

  findNearestCharacterHit(characterIndex: number): NearestCharacterHit {
    const start = this.resolveClusterStart(characterIndex)
    if (start === null) {
      return { characterHit: characterHit(characterIndex), width: 0 }
    }

    const cluster = this.glyphClusters[start]
    let end = start
    let width = 0
    while (end < this.glyphCount && this.glyphClusters[end] === cluster) {
      width += this.glyphAdvanceAt(end)
      end++
    }

    return { characterHit: characterHit(cluster, this.clusterLength(start, end)), width }
  }

  getDistanceFromCharacterHit(hit: CharacterHit): number {
    if (caretIndex(hit) > this.characterEnd) {
      return this.bounds.width
    }

    // glyphCount measures the whole run
    let glyphIndex = this.findGlyphIndex(hit.firstCharacterIndex)
    if (glyphIndex === null) return 0

    if (hit.trailingLength > 0 && glyphIndex < this.glyphCount) {
      const cluster = this.glyphClusters[glyphIndex]
      while (glyphIndex < this.glyphCount && this.glyphClusters[glyphIndex] === cluster) {
        glyphIndex++
      }
    }

    let distance = 0
    for (let i = 0; i < glyphIndex; i++) {
      distance += this.glyphAdvanceAt(i)
    }
    return distance
  }

  getCharacterHitFromDistance(distance: number): DistanceHit {
    const lastGlyph = this.glyphCount - 1

    if (distance < 0) {
      const { characterHit: first } = this.findNearestCharacterHit(this.glyphClusters[0])
      return { characterHit: this.isLeftToRight ? leadingEdge(first) : first, isInside: false }
    }

    if (distance > this.bounds.width) {
      const { characterHit: last } = this.findNearestCharacterHit(this.glyphClusters[lastGlyph])
      return { characterHit: this.isLeftToRight ? last : leadingEdge(last), isInside: false }
    }

    let currentX = 0
    let index = 0
    for (; index < lastGlyph; index++) {
      const advance = this.glyphAdvanceAt(index)
      if (currentX + advance >= distance) break
      currentX += advance
    }

    const { characterHit: hit, width } = this.findNearestCharacterHit(this.glyphClusters[index])
    const offset = this.getDistanceFromCharacterHit(leadingEdge(hit))

    // Past the middle of the cluster counts as its trailing edge
    const isTrailing = distance > offset + width / 2
    return { characterHit: isTrailing ? hit : leadingEdge(hit), isInside: true }
  }

  /**
   * Next caret stop in logical order: a leading hit moves to the trailing
   * edge of its cluster, a trailing hit to the leading edge of the cluster
   * after it. Returns `hit` itself once the caret is at the end of the
   * character range.
   */
  getNextCaretCharacterHit(hit: CharacterHit): CharacterHit {
    const caret = caretIndex(hit)
    if (caret >= this.characterEnd) {
      return hit
    }
    if (hit.trailingLength === 0) {
      return this.findNearestCharacterHit(hit.firstCharacterIndex).characterHit
    }
    return leadingEdge(this.findNearestCharacterHit(caret).characterHit)
  }

  /**
   * Previous caret stop in logical order: a trailing hit collapses to its
   * leading edge, a leading hit moves to the trailing edge of the cluster
   * before it. Returns a hit equal to `hit` at the start of the range.
   */
  getPreviousCaretCharacterHit(hit: CharacterHit): CharacterHit {
    if (hit.trailingLength !== 0) {
      return leadingEdge(hit)
    }
    if (hit.firstCharacterIndex <= this.characters.start) {
      return characterHit(this.characters.start)
    }
    return this.findNearestCharacterHit(hit.firstCharacterIndex - 1).characterHit
  }

  private resolveClusterStart(characterIndex: number): number | null {
    const glyphIndex = this.findGlyphIndex(characterIndex)
    if (glyphIndex === null) return null
    if (glyphIndex < this.glyphCount) return glyphIndex

    // glyphCount: the cluster at the end of glyph order
    return lowerBound(this.glyphClusters, this.glyphClusters[this.glyphCount - 1], this.order)
  }

  // Characters covered by the cluster at glyphs [start, end)
  private clusterLength(start: number, end: number): number {
    const cluster = this.glyphClusters[start]
    let next: number
    if (this.isLeftToRight) {
      next = end < this.glyphCount ? this.glyphClusters[end] : this.characterEnd
    } else {
      next = start > 0 ? this.glyphClusters[start - 1] : this.characterEnd
    }
    return next - cluster
  }

  private calculateBounds(): Rect {
    const { ascent, descent, lineGap } = this.typeface
    const height = (descent - ascent + lineGap) * this.scale

    let width = 0
    for (let i = 0; i < this.glyphCount; i++) {
      width += this.glyphAdvanceAt(i)
    }

    return { x: 0, y: 0, width, height }
  }
}
