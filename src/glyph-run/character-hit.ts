// Character hits: a caret stop as (character index, trailing length)

/**
 * A position at the leading (`trailingLength === 0`) or trailing edge of a
 * cluster. The caret of a trailing hit sits after `trailingLength` characters.
 */
export interface CharacterHit {
  readonly firstCharacterIndex: number
  readonly trailingLength: number
}

export function characterHit(firstCharacterIndex: number, trailingLength: number = 0): CharacterHit {
  return { firstCharacterIndex, trailingLength }
}

export function leadingEdge(hit: CharacterHit): CharacterHit {
  return hit.trailingLength === 0 ? hit : characterHit(hit.firstCharacterIndex)
}

export function caretIndex(hit: CharacterHit): number {
  return hit.firstCharacterIndex + hit.trailingLength
}

// Navigation returns a hit equal to its input when it cannot move
export function characterHitsEqual(a: CharacterHit, b: CharacterHit): boolean {
  return a.firstCharacterIndex === b.firstCharacterIndex && a.trailingLength === b.trailingLength
}
