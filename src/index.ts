// Pipeline
export {
  runPipeline,
  CLEANED_DATA_FILE,
  type PipelineResult,
  type PipelineRunOptions,
  type StageTimings,
} from './pipeline'

// Configuration
export {
  DEFAULT_PIPELINE_CONFIG,
  resolvePipelineConfig,
} from './config/pipeline-config'
export { parseCliArgs, USAGE, type CliOptions } from './config/cli-options'

// Types - Records
export {
  SALES_COLUMNS,
  REQUIRED_COLUMNS,
  lineTotalCents,
  type RawRow,
  type SalesColumn,
  type SalesRecord,
  type DropReason,
} from './types/record'

// Types - Configuration
export {
  DATE_BUCKET_GRANULARITIES,
  type DateBucketGranularity,
  type BenchmarkSettings,
  type PipelineConfig,
  type PipelineOptions,
} from './types/config'

// Loading and cleaning
export {
  loadSalesDataset,
  parseSalesCSV,
  formatSalesCSV,
  recordToRow,
  writeCleanedRecords,
  type LoadedDataset,
  type DatasetMetadata,
  type CSVParseOptions,
} from './core/dataset-loader'
export {
  cleanRows,
  requireRecords,
  type CleaningOptions,
  type CleaningResult,
} from './core/cleaner'
export {
  createSalesRowSchema,
  parseSalesRecord,
  type SalesRowSchema,
} from './core/schema'
export * from './core/normalizers'

// Analysis
export * from './analysis'

// Sorting and searching
export * from './algorithms'

// Benchmarks
export * from './benchmark'

// Export
export {
  exportResults,
  buildChartSpecs,
  buildSummaryReport,
  formatRankingCsv,
  writeRankingCsv,
  layoutBarChart,
  renderBarChart,
  writeChart,
  type ExportInput,
  type ExportedFiles,
  type ExportedFigures,
  type ReportInput,
  type CleaningSummary,
  type BarChartSpec,
  type BarSeries,
  type ChartDimensions,
  type ChartLayout,
} from './export'

// Errors
export {
  SalesPipelineError,
  MalformedRowError,
  MissingFileError,
  MalformedDatasetError,
  EmptyDatasetError,
  InvalidParameterError,
  AmountOverflowError,
  ConfigurationError,
  isSalesPipelineError,
} from './utils/errors'

// Logging
export {
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  defaultLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
} from './utils/logger'
