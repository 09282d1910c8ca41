import { naturalOrder, type Comparator } from './comparators'

/**
 * Stable top-down merge sort.
 *
 * Time O(n log n), extra space O(n). Returns a new array and leaves the
 * input untouched. Elements with equal keys keep their input order, so the
 * output equals `[...items].sort(compare)` for any consistent comparator.
 *
 * @example
 * ```typescript
 * mergeSort([3, 1, 2]) // [1, 2, 3]
 * mergeSort(records, compareBy((r) => r.date))
 * ```
 */
export function mergeSort<T>(
  items: readonly T[],
  compare: Comparator<T> = naturalOrder
): T[] {
  const source = items.slice()
  if (source.length <= 1) {
    return source
  }

  const buffer = new Array<T>(source.length)
  sortRange(source, buffer, 0, source.length, compare)
  return source
}

/**
 * Sorts `items[start, end)` in place, using `buffer` as merge scratch space.
 */
function sortRange<T>(
  items: T[],
  buffer: T[],
  start: number,
  end: number,
  compare: Comparator<T>
): void {
  if (end - start <= 1) return

  const mid = start + Math.floor((end - start) / 2)
  sortRange(items, buffer, start, mid, compare)
  sortRange(items, buffer, mid, end, compare)

  // Already ordered across the split
  if (compare(items[mid - 1], items[mid]) <= 0) return

  merge(items, buffer, start, mid, end, compare)
}

function merge<T>(
  items: T[],
  buffer: T[],
  start: number,
  mid: number,
  end: number,
  compare: Comparator<T>
): void {
  for (let k = start; k < end; k++) {
    buffer[k] = items[k]
  }

  let i = start
  let j = mid
  let k = start

  while (i < mid && j < end) {
    // Taking from the left run on ties keeps the sort stable
    if (compare(buffer[i], buffer[j]) <= 0) {
      items[k++] = buffer[i++]
    } else {
      items[k++] = buffer[j++]
    }
  }
  while (i < mid) {
    items[k++] = buffer[i++]
  }
  while (j < end) {
    items[k++] = buffer[j++]
  }
}

/**
 * Sorts with the runtime's built-in (stable) sort on a copy. Used as the
 * reference implementation in benchmarks and tests.
 */
export function builtinSort<T>(
  items: readonly T[],
  compare: Comparator<T> = naturalOrder
): T[] {
  return items.slice().sort(compare)
}

/**
 * Checks that `items` is in non-decreasing order under `compare`.
 */
export function isSorted<T>(
  items: readonly T[],
  compare: Comparator<T> = naturalOrder
): boolean {
  for (let i = 1; i < items.length; i++) {
    if (compare(items[i - 1], items[i]) > 0) return false
  }
  return true
}
