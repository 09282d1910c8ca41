import {
  ascending,
  compareBy,
  descending,
  mergeSort,
  thenBy,
} from '../algorithms'
import { addExact } from '../core/normalizers'
import { lineTotalCents, type SalesRecord } from '../types/record'
import type { DateBucketGranularity } from '../types/config'
import { bucketKey } from './buckets'
import type { PeriodRevenue, RankedEntry } from './types'

interface Totals {
  revenueCents: number
  quantity: number
  orderCount: number
}

type GroupEntry = Omit<RankedEntry, 'rank'>

/**
 * Revenue, quantity and order count per key, in first-seen key order.
 */
export function groupTotals(
  records: readonly SalesRecord[],
  keyOf: (record: SalesRecord) => string
): Map<string, Totals> {
  const groups = new Map<string, Totals>()

  for (const record of records) {
    const key = keyOf(record)
    const totals = groups.get(key) ?? { revenueCents: 0, quantity: 0, orderCount: 0 }
    totals.revenueCents = addExact(
      totals.revenueCents,
      lineTotalCents(record),
      `revenue of ${key}`
    )
    totals.quantity = addExact(totals.quantity, record.quantity, `quantity of ${key}`)
    totals.orderCount += 1
    groups.set(key, totals)
  }

  return groups
}

/**
 * Orders ranking entries by revenue, highest first; equal revenue falls
 * back to ascending key order so the ranking is fully determined.
 */
export const byRevenueThenKey = thenBy<GroupEntry>(
  compareBy((entry: GroupEntry) => entry.revenueCents, descending),
  compareBy((entry: GroupEntry) => entry.key, ascending)
)

/**
 * Groups records by key and ranks the groups by revenue.
 *
 * @param limit - Keep only the first `limit` entries (default: all)
 *
 * @example
 * ```typescript
 * rankByRevenue(records, (r) => r.customer, 10)
 * // [{ rank: 1, key: 'A', revenueCents: 2000, quantity: 2, orderCount: 1 }, ...]
 * ```
 */
export function rankByRevenue(
  records: readonly SalesRecord[],
  keyOf: (record: SalesRecord) => string,
  limit?: number
): RankedEntry[] {
  const entries = Array.from(
    groupTotals(records, keyOf),
    ([key, totals]): GroupEntry => ({ key, ...totals })
  )

  const ranked = mergeSort(entries, byRevenueThenKey)
  const kept = limit === undefined ? ranked : ranked.slice(0, limit)

  return kept.map((entry, index) => ({ rank: index + 1, ...entry }))
}

/**
 * Sums revenue per time bucket, in chronological order, with growth
 * against the previous bucket.
 */
export function revenueByPeriod(
  records: readonly SalesRecord[],
  granularity: DateBucketGranularity
): PeriodRevenue[] {
  const groups = groupTotals(records, (record) =>
    bucketKey(record.date, granularity)
  )
  const periods = mergeSort(Array.from(groups.keys()), ascending)

  let previous: number | null = null
  return periods.map((period) => {
    const totals = groups.get(period) ?? { revenueCents: 0, orderCount: 0 }
    const growthPercent =
      previous !== null && previous > 0
        ? ((totals.revenueCents - previous) / previous) * 100
        : null
    previous = totals.revenueCents

    return {
      period,
      revenueCents: totals.revenueCents,
      orderCount: totals.orderCount,
      growthPercent,
    }
  })
}
