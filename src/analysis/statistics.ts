import {
  ascending,
  compareBy,
  descending,
  mergeSort,
  thenBy,
} from '../algorithms'
import { lineTotalCents, type SalesRecord } from '../types/record'
import { requirePositiveInteger } from '../utils/errors'
import type {
  CustomerSegment,
  HistogramBin,
  OutlierOrder,
  OutlierSummary,
  SpendingTier,
} from './types'

/**
 * Quantile of an ascending array by linear interpolation between the two
 * nearest ranks. Returns 0 for an empty array.
 *
 * @example
 * ```typescript
 * quantile([1, 2, 3, 4], 0.25) // 1.75
 * quantile([1, 2, 3, 4], 0.5)  // 2.5
 * ```
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0

  const position = (sorted.length - 1) * q
  const lower = Math.floor(position)
  const upper = Math.ceil(position)
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower)
}

const byLineTotalDesc = thenBy<OutlierOrder>(
  compareBy((order: OutlierOrder) => order.lineTotalCents, descending),
  compareBy((order: OutlierOrder) => order.orderId, ascending)
)

/**
 * Flags orders whose line total exceeds `Q3 + 1.5 × IQR`.
 */
export function findOutliers(records: readonly SalesRecord[]): OutlierSummary {
  const totals = mergeSort(records.map(lineTotalCents), ascending)
  const q1Cents = quantile(totals, 0.25)
  const q3Cents = quantile(totals, 0.75)
  const thresholdCents = q3Cents + 1.5 * (q3Cents - q1Cents)

  const orders = records
    .filter((record) => lineTotalCents(record) > thresholdCents)
    .map((record) => ({
      orderId: record.orderId,
      customer: record.customer,
      lineTotalCents: lineTotalCents(record),
    }))

  return {
    q1Cents,
    q3Cents,
    thresholdCents,
    orders: mergeSort(orders, byLineTotalDesc),
  }
}

export const HISTOGRAM_BINS = 20

/**
 * Counts values in `binCount` equal-width bins spanning min to max.
 * Every bin but the last is half-open; the last one includes the maximum.
 * When all values are equal there is a single bin.
 *
 * @example
 * ```typescript
 * histogram([0, 10, 20, 40], 2)
 * // [{ lowerCents: 0, upperCents: 20, count: 2 }, { lowerCents: 20, upperCents: 40, count: 2 }]
 * ```
 */
export function histogram(
  values: readonly number[],
  binCount: number = HISTOGRAM_BINS
): HistogramBin[] {
  requirePositiveInteger(binCount, 'binCount')
  if (values.length === 0) return []

  let min = values[0]
  let max = values[0]
  for (const value of values) {
    if (value < min) min = value
    if (value > max) max = value
  }
  if (min === max) {
    return [{ lowerCents: min, upperCents: max, count: values.length }]
  }

  const span = max - min
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, index) => ({
    lowerCents: min + (span * index) / binCount,
    upperCents: min + (span * (index + 1)) / binCount,
    count: 0,
  }))

  for (const value of values) {
    const index = Math.min(binCount - 1, Math.floor(((value - min) * binCount) / span))
    bins[index].count += 1
  }

  return bins
}

export const SPENDING_TIERS: readonly SpendingTier[] = [
  'Bronze',
  'Silver',
  'Gold',
  'Platinum',
]

/**
 * Splits customers into quartile tiers of lifetime revenue.
 * A customer exactly on a quartile boundary falls into the lower tier.
 *
 * @param lifetimeRevenue - Revenue in cents per customer
 * @returns Counts for every tier in Bronze → Platinum order, or an empty
 *   list when there are fewer than four customers
 */
export function segmentCustomers(
  lifetimeRevenue: readonly number[]
): CustomerSegment[] {
  if (lifetimeRevenue.length < 4) return []

  const sorted = mergeSort(lifetimeRevenue, ascending)
  const bounds = [0.25, 0.5, 0.75].map((q) => quantile(sorted, q))
  const counts = [0, 0, 0, 0]

  for (const value of lifetimeRevenue) {
    let tier = bounds.findIndex((bound) => value <= bound)
    if (tier === -1) tier = 3
    counts[tier] += 1
  }

  return SPENDING_TIERS.map((tier, index) => ({
    tier,
    customers: counts[index],
  }))
}
