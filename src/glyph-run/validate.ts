// Construction-time checks for glyph run attributes
// A failure here means the shaping layer produced inconsistent data

import { isSorted } from '../shared/binary-search'
import type { GlyphRunOptions } from './glyph-run'

const MAX_U16 = 0xffff

function isU16(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_U16
}

function checkU16Sequence(name: string, values: ArrayLike<number>): void {
  for (let i = 0; i < values.length; i++) {
    if (!isU16(values[i])) {
      throw new Error(`${name}[${i}] is not an unsigned 16-bit value: ${values[i]}`)
    }
  }
}

function checkOptionalLength(name: string, length: number, glyphCount: number): void {
  if (length > 0 && length !== glyphCount) {
    throw new Error(`${name} has ${length} entries, expected 0 or ${glyphCount}`)
  }
}

export function validateGlyphRunOptions(options: GlyphRunOptions): void {
  const {
    fontRenderingEmSize,
    glyphIndices,
    glyphAdvances = [],
    glyphOffsets = [],
    characters,
    glyphClusters,
    biDiLevel = 0,
  } = options

  if (!Number.isFinite(fontRenderingEmSize) || fontRenderingEmSize <= 0) {
    throw new Error(`fontRenderingEmSize must be a positive number, got ${fontRenderingEmSize}`)
  }

  if (!(options.typeface.designEmHeight > 0)) {
    throw new Error(`Typeface designEmHeight must be positive, got ${options.typeface.designEmHeight}`)
  }

  const glyphCount = glyphIndices.length
  if (glyphCount === 0) {
    throw new Error('A glyph run needs at least one glyph')
  }
  checkU16Sequence('glyphIndices', glyphIndices)

  checkOptionalLength('glyphAdvances', glyphAdvances.length, glyphCount)
  checkOptionalLength('glyphOffsets', glyphOffsets.length, glyphCount)

  if (!Number.isInteger(biDiLevel) || biDiLevel < 0) {
    throw new Error(`biDiLevel must be a non-negative integer, got ${biDiLevel}`)
  }

  const { text, start, length } = characters
  if (!Number.isInteger(start) || !Number.isInteger(length) || start < 0 || length < 1) {
    throw new Error(`Invalid character range: start ${start}, length ${length}`)
  }
  if (start + length > text.length) {
    throw new Error(`Character range ${start}+${length} exceeds text of length ${text.length}`)
  }

  if (glyphClusters.length !== glyphCount) {
    throw new Error(`glyphClusters has ${glyphClusters.length} entries, expected ${glyphCount}`)
  }
  checkU16Sequence('glyphClusters', glyphClusters)

  for (let i = 0; i < glyphClusters.length; i++) {
    if (glyphClusters[i] < start || glyphClusters[i] >= start + length) {
      throw new Error(`glyphClusters[${i}] = ${glyphClusters[i]} is outside the character range`)
    }
  }

  const leftToRight = (biDiLevel & 1) === 0
  if (!isSorted(glyphClusters, leftToRight ? 'ascending' : 'descending')) {
    throw new Error(
      leftToRight
        ? 'glyphClusters must be non-decreasing for a left-to-right run'
        : 'glyphClusters must be non-increasing for a right-to-left run'
    )
  }
}
