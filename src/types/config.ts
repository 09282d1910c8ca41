/**
 * Time bucket sizes for the revenue breakdown.
 * - `'day'`: `2024-01-05`
 * - `'week'`: ISO-8601 week, `2024-W01`
 * - `'month'`: `2024-01`
 * - `'quarter'`: `2024-Q1`
 * - `'year'`: `2024`
 */
export type DateBucketGranularity = 'day' | 'week' | 'month' | 'quarter' | 'year'

export const DATE_BUCKET_GRANULARITIES: readonly DateBucketGranularity[] = [
  'day',
  'week',
  'month',
  'quarter',
  'year',
]

/**
 * Settings for the sort/search timing comparison.
 */
export interface BenchmarkSettings {
  /** Unmeasured runs before timing starts */
  warmupRuns: number
  /** Measured runs averaged into the reported time */
  measurementRuns: number
  /** Sizes of the synthetic datasets for the scalability series */
  syntheticSizes: number[]
  /** Seed for the synthetic data generator */
  seed: number
}

/**
 * Fully resolved pipeline configuration.
 */
export interface PipelineConfig {
  /** Raw delimited input file */
  inputPath: string
  /** Directory receiving the cleaned dataset, report, rankings and figures */
  outputDir: string
  /** Length of the top customer/product rankings */
  topN: number
  /** Bucket size of the revenue-by-period breakdown */
  granularity: DateBucketGranularity
  benchmark: BenchmarkSettings
}

/**
 * Configuration as accepted from callers; omitted fields take defaults.
 */
export interface PipelineOptions {
  inputPath?: string
  outputDir?: string
  topN?: number
  granularity?: DateBucketGranularity
  benchmark?: Partial<BenchmarkSettings>
}
