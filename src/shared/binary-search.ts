// Lower-bound binary search over a sorted numeric sequence

export type SortOrder = 'ascending' | 'descending'

/**
 * First index whose value does not come before `target` in the given order,
 * or `values.length` when every value does.
 *
 * For an ascending sequence that is the first value `>= target`; for a
 * descending one, the first value `<= target`.
 */
export function lowerBound(values: ArrayLike<number>, target: number, order: SortOrder): number {
  const sign = order === 'ascending' ? 1 : -1
  let lo = 0
  let hi = values.length

  while (lo < hi) {
    const mid = (lo + hi) >>> 1
    if ((values[mid] - target) * sign < 0) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }

  return lo
}

export function isSorted(values: ArrayLike<number>, order: SortOrder): boolean {
  const sign = order === 'ascending' ? 1 : -1
  for (let i = 1; i < values.length; i++) {
    if ((values[i] - values[i - 1]) * sign < 0) return false
  }
  return true
}
