export { analyzeSales, UNSPECIFIED_REGION } from './analyzer'
export {
  groupTotals,
  rankByRevenue,
  revenueByPeriod,
  byRevenueThenKey,
} from './grouping'
export { bucketKey, isoWeek } from './buckets'
export {
  quantile,
  histogram,
  HISTOGRAM_BINS,
  findOutliers,
  segmentCustomers,
  SPENDING_TIERS,
} from './statistics'
export type {
  RankedEntry,
  PeriodRevenue,
  OutlierOrder,
  OutlierSummary,
  HistogramBin,
  SpendingTier,
  CustomerSegment,
  AnalysisOptions,
  SalesAnalysis,
} from './types'
