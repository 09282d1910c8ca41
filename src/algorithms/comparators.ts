/**
 * Comparator type and helpers shared by the sort and search routines.
 * A comparator returns a negative number when `a` orders first, a positive
 * number when `b` does and 0 when both share a key.
 */
export type Comparator<T> = (a: T, b: T) => number

/**
 * Natural ascending order for numbers and strings.
 * Strings compare by UTF-16 code units, the same order as `<`, so the
 * result does not depend on the runtime locale.
 */
export function ascending<K extends number | string>(a: K, b: K): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Default order of the sort and search routines: numbers numerically,
 * everything else by its string form.
 */
export function naturalOrder<T>(a: T, b: T): number {
  if (typeof a === 'number' && typeof b === 'number') return ascending(a, b)
  return ascending(String(a), String(b))
}

/**
 * Natural descending order.
 */
export function descending<K extends number | string>(a: K, b: K): number {
  return ascending(b, a)
}

/**
 * Orders items by a derived key.
 *
 * @example
 * ```typescript
 * const byDate = compareBy((record: SalesRecord) => record.date)
 * ```
 */
export function compareBy<T, K extends number | string>(
  key: (item: T) => K,
  order: Comparator<K> = ascending
): Comparator<T> {
  return (a, b) => order(key(a), key(b))
}

/**
 * Chains comparators: later ones break ties left by earlier ones.
 */
export function thenBy<T>(...comparators: Comparator<T>[]): Comparator<T> {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b)
      if (result !== 0) return result
    }
    return 0
  }
}
