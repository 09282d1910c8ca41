/**
 * Sort/search benchmarking: custom routines against the built-in ones.
 */

export {
  runComparison,
  runSortBenchmark,
  runSearchBenchmark,
  runScalabilityBenchmark,
  runAlgorithmBenchmarks,
  allComparisons,
  MIN_BENCHMARK_SIZE,
  type BenchmarkConfig,
  type ComparisonResult,
  type ScalabilityPoint,
  type AlgorithmBenchmarkReport,
} from './benchmark-runner'

export {
  MetricsCollector,
  summarizeTimings,
  type TimingStats,
} from './metrics-collector'

export {
  createRandom,
  generateLineTotals,
  pickSearchTargets,
} from './synthetic-data'
