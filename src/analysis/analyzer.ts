/**
 * Descriptive analytics over a cleaned dataset.
 * @module analysis/analyzer
 */

import { ascending, mergeSort } from '../algorithms'
import { addExact, divideCents } from '../core/normalizers'
import { requireOneOf, requirePositiveInteger } from '../utils/errors'
import { lineTotalCents, type SalesRecord } from '../types/record'
import { DATE_BUCKET_GRANULARITIES } from '../types/config'
import { groupTotals, rankByRevenue, revenueByPeriod } from './grouping'
import { findOutliers, histogram, segmentCustomers } from './statistics'
import type { AnalysisOptions, SalesAnalysis } from './types'

export const UNSPECIFIED_REGION = '(unspecified)'

/**
 * Computes every metric of the summary report. Pure: the result depends
 * only on `records` and `options`.
 *
 * @throws {InvalidParameterError} When `topN` or `granularity` is invalid
 * @throws {AmountOverflowError} When a total exceeds the exact integer range
 *
 * @example
 * ```typescript
 * const analysis = analyzeSales(records, { topN: 10, granularity: 'month' })
 * analysis.topProducts[0] // { rank: 1, key: 'X', revenueCents: 3000, ... }
 * ```
 */
export function analyzeSales(
  records: readonly SalesRecord[],
  options: AnalysisOptions
): SalesAnalysis {
  const topN = requirePositiveInteger(options.topN, 'topN')
  const granularity = requireOneOf(
    options.granularity,
    DATE_BUCKET_GRANULARITIES,
    'granularity'
  )

  let totalRevenueCents = 0
  let totalQuantity = 0
  for (const record of records) {
    totalRevenueCents = addExact(
      totalRevenueCents,
      lineTotalCents(record),
      'total revenue'
    )
    totalQuantity = addExact(totalQuantity, record.quantity, 'total quantity')
  }

  const customers = groupTotals(records, (record) => record.customer)
  const repeatCustomers = Array.from(customers.values()).filter(
    (totals) => totals.orderCount > 1
  ).length

  const dates = mergeSort(
    records.map((record) => record.date),
    ascending
  )

  return {
    orderCount: records.length,
    totalRevenueCents,
    totalQuantity,
    averageOrderValueCents: divideCents(totalRevenueCents, records.length),
    uniqueCustomers: customers.size,
    repeatCustomerRate:
      customers.size > 0 ? (repeatCustomers / customers.size) * 100 : 0,
    topCustomers: rankByRevenue(records, (record) => record.customer, topN),
    topProducts: rankByRevenue(records, (record) => record.product, topN),
    revenueByRegion: rankByRevenue(
      records,
      (record) => record.region ?? UNSPECIFIED_REGION
    ),
    granularity,
    revenueByPeriod: revenueByPeriod(records, granularity),
    outliers: findOutliers(records),
    lineTotalDistribution: histogram(records.map(lineTotalCents)),
    customerSegments: segmentCustomers(
      Array.from(customers.values(), (totals) => totals.revenueCents)
    ),
    dateRange: {
      first: dates[0] ?? '',
      last: dates[dates.length - 1] ?? '',
    },
  }
}
