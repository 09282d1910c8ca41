import type { DateBucketGranularity } from '../types/config'

/**
 * One position in a revenue ranking.
 */
export interface RankedEntry {
  /** 1-based position */
  rank: number
  /** Grouping key (customer, product or region) */
  key: string
  revenueCents: number
  quantity: number
  orderCount: number
}

/**
 * Revenue for one time bucket.
 */
export interface PeriodRevenue {
  /** Bucket key, e.g. `2024-01` for monthly buckets */
  period: string
  revenueCents: number
  orderCount: number
  /** Percent change against the previous bucket; null for the first bucket or after a zero bucket */
  growthPercent: number | null
}

export interface OutlierOrder {
  orderId: string
  customer: string
  lineTotalCents: number
}

/**
 * Orders whose line total lies above `Q3 + 1.5 × IQR`.
 */
export interface OutlierSummary {
  q1Cents: number
  q3Cents: number
  thresholdCents: number
  /** Largest first; ties by order id */
  orders: OutlierOrder[]
}

/**
 * One equal-width bin of a histogram. The last bin also holds its upper bound.
 */
export interface HistogramBin {
  lowerCents: number
  upperCents: number
  count: number
}

export type SpendingTier = 'Bronze' | 'Silver' | 'Gold' | 'Platinum'

export interface CustomerSegment {
  tier: SpendingTier
  customers: number
}

export interface AnalysisOptions {
  /** Length of the customer and product rankings */
  topN: number
  granularity: DateBucketGranularity
}

/**
 * Everything the analyzer derives from a cleaned dataset.
 */
export interface SalesAnalysis {
  orderCount: number
  totalRevenueCents: number
  totalQuantity: number
  /** Total revenue per order, rounded to whole cents */
  averageOrderValueCents: number
  uniqueCustomers: number
  /** Percent of customers with more than one order */
  repeatCustomerRate: number
  topCustomers: RankedEntry[]
  topProducts: RankedEntry[]
  /** Every region, ranked; records without one fall under `(unspecified)` */
  revenueByRegion: RankedEntry[]
  granularity: DateBucketGranularity
  /** Ascending by period */
  revenueByPeriod: PeriodRevenue[]
  outliers: OutlierSummary
  /** Line totals in equal-width bins; empty for no records */
  lineTotalDistribution: HistogramBin[]
  /** Empty when there are fewer than four customers */
  customerSegments: CustomerSegment[]
  dateRange: { first: string; last: string }
}
