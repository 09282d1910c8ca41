import { naturalOrder, type Comparator } from './comparators'

/**
 * Index returned by the search routines when no element matches.
 */
export const NOT_FOUND = -1

/**
 * Binary search for the leftmost element equal to `target`.
 *
 * Time O(log n).
 *
 * Precondition: `sorted` must be in non-decreasing order under `compare`.
 * This is not checked; on unsorted input the result is unspecified and
 * may be `NOT_FOUND` even when the target is present.
 *
 * When several elements match, the lowest index is returned, which is
 * the same index a left-to-right linear scan finds.
 *
 * @returns Index of the first matching element, or `NOT_FOUND`
 *
 * @example
 * ```typescript
 * binarySearch([1, 2, 2, 2, 5], 2) // 1
 * binarySearch([1, 2, 5], 3)       // -1
 * ```
 */
export function binarySearch<T>(
  sorted: readonly T[],
  target: T,
  compare: Comparator<T> = naturalOrder
): number {
  let lo = 0
  let hi = sorted.length

  // Lower bound: first index whose element is not less than target
  while (lo < hi) {
    const mid = lo + Math.floor((hi - lo) / 2)
    if (compare(sorted[mid], target) < 0) {
      lo = mid + 1
    } else {
      hi = mid
    }
  }

  return lo < sorted.length && compare(sorted[lo], target) === 0 ? lo : NOT_FOUND
}

/**
 * Linear search for the first element equal to `target`. Time O(n).
 * Works on unsorted input.
 *
 * @returns Index of the first matching element, or `NOT_FOUND`
 */
export function linearSearch<T>(
  items: readonly T[],
  target: T,
  compare: Comparator<T> = naturalOrder
): number {
  for (let i = 0; i < items.length; i++) {
    if (compare(items[i], target) === 0) return i
  }
  return NOT_FOUND
}

/**
 * Built-in counterpart of the searches for primitive values
 * (`Array.prototype.indexOf`, strict equality).
 */
export function builtinSearch<T>(items: readonly T[], target: T): number {
  return items.indexOf(target)
}
