/**
 * Benchmark runner comparing the hand-written sort/search routines with
 * the runtime's built-in ones on the same input.
 * Runs are synchronous: warmup runs first, then measured runs whose times
 * are averaged.
 */

import {
  ascending,
  binarySearch,
  builtinSearch,
  builtinSort,
  linearSearch,
  mergeSort,
  type Comparator,
} from '../algorithms'
import { createSilentLogger, type Logger } from '../utils/logger'
import { requireNonNegativeInteger, requirePositiveInteger } from '../utils/errors'
import { lineTotalCents, type SalesRecord } from '../types/record'
import type { BenchmarkSettings } from '../types/config'
import { MetricsCollector, type TimingStats } from './metrics-collector'
import { generateLineTotals, pickSearchTargets } from './synthetic-data'

export interface BenchmarkConfig {
  name: string
  /** Short label for charts (default: name) */
  label?: string
  description?: string
  warmupRuns?: number
  measurementRuns?: number
}

export interface ComparisonResult {
  name: string
  label: string
  description?: string
  /** Number of elements in the input */
  inputSize: number
  custom: TimingStats
  builtin: TimingStats
  /** Mean custom time divided by mean built-in time; null when the built-in mean is 0 */
  relative: number | null
  /** Whether both implementations produced the same output */
  outputsMatch: boolean
}

export interface ScalabilityPoint {
  size: number
  sort: ComparisonResult
  binarySearch: ComparisonResult
}

export interface AlgorithmBenchmarkReport {
  /** Comparisons over the dataset's line totals; null when the dataset was too small */
  dataset: {
    size: number
    sort: ComparisonResult
    binarySearch: ComparisonResult
    linearSearch: ComparisonResult
  } | null
  skippedReason?: string
  scalability: ScalabilityPoint[]
}

/** Datasets smaller than this skip the dataset comparison */
export const MIN_BENCHMARK_SIZE = 10

function arraysEqual<T>(a: readonly T[], b: readonly T[]): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

function timeRun<R>(fn: () => R): { result: R; executionTimeMs: number } {
  const startTime = performance.now()
  const result = fn()
  return { result, executionTimeMs: performance.now() - startTime }
}

/**
 * Times two implementations of the same operation.
 *
 * Outputs of the first measured run are compared with `equals`. Custom and
 * built-in runs alternate so that drift affects both alike.
 */
export function runComparison<R>(
  config: BenchmarkConfig,
  inputSize: number,
  custom: () => R,
  builtin: () => R,
  equals: (a: R, b: R) => boolean
): ComparisonResult {
  const { name, description } = config
  const warmupRuns = requireNonNegativeInteger(config.warmupRuns ?? 1, 'warmupRuns')
  const measurementRuns = requirePositiveInteger(
    config.measurementRuns ?? 3,
    'measurementRuns'
  )

  for (let i = 0; i < warmupRuns; i++) {
    custom()
    builtin()
  }

  const collector = new MetricsCollector()
  let outputsMatch = true

  for (let i = 0; i < measurementRuns; i++) {
    const customRun = timeRun(custom)
    const builtinRun = timeRun(builtin)
    collector.addRun('custom', customRun.executionTimeMs)
    collector.addRun('builtin', builtinRun.executionTimeMs)

    if (i === 0) {
      outputsMatch = equals(customRun.result, builtinRun.result)
    }
  }

  const customStats = collector.getStats('custom')
  const builtinStats = collector.getStats('builtin')

  return {
    name,
    label: config.label ?? name,
    description,
    inputSize,
    custom: customStats,
    builtin: builtinStats,
    relative:
      builtinStats.meanMs > 0 ? customStats.meanMs / builtinStats.meanMs : null,
    outputsMatch,
  }
}

/**
 * Merge sort against `Array.prototype.sort` on copies of `values`.
 */
export function runSortBenchmark(
  values: readonly number[],
  config: Partial<BenchmarkConfig> = {}
): ComparisonResult {
  return runComparison(
    {
      name: 'merge sort vs Array.prototype.sort',
      label: `sort n=${values.length}`,
      description: 'custom O(n log n) stable sort, built-in stable sort',
      ...config,
    },
    values.length,
    () => mergeSort(values, ascending),
    () => builtinSort(values, ascending),
    arraysEqual
  )
}

/**
 * Looks up every target in `sorted` with the chosen custom search and with
 * `Array.prototype.indexOf`. Both return the first matching index, so their
 * outputs agree on sorted input.
 */
export function runSearchBenchmark(
  sorted: readonly number[],
  targets: readonly number[],
  algorithm: 'binary' | 'linear' = 'binary',
  config: Partial<BenchmarkConfig> = {}
): ComparisonResult {
  const search: (
    items: readonly number[],
    target: number,
    compare: Comparator<number>
  ) => number = algorithm === 'binary' ? binarySearch : linearSearch

  return runComparison(
    {
      name:
        algorithm === 'binary'
          ? 'binary search vs Array.prototype.indexOf'
          : 'linear search vs Array.prototype.indexOf',
      label: `${algorithm} search n=${sorted.length}`,
      description:
        algorithm === 'binary'
          ? 'custom O(log n) search, built-in O(n) scan'
          : 'custom O(n) scan, built-in O(n) scan',
      ...config,
    },
    sorted.length,
    () => targets.map((target) => search(sorted, target, ascending)),
    () => targets.map((target) => builtinSearch(sorted, target)),
    arraysEqual
  )
}

/**
 * Repeats the sort and binary search comparisons on synthetic datasets of
 * increasing size.
 */
export function runScalabilityBenchmark(
  sizes: readonly number[],
  seed: number,
  config: Partial<BenchmarkConfig> = {}
): ScalabilityPoint[] {
  return sizes.map((size, index) => {
    const values = generateLineTotals(size, seed + index)
    const sorted = mergeSort(values, ascending)
    const targets = pickSearchTargets(sorted)

    return {
      size,
      sort: runSortBenchmark(values, {
        ...config,
        name: `merge sort vs built-in (n=${size})`,
      }),
      binarySearch: runSearchBenchmark(sorted, targets, 'binary', {
        ...config,
        name: `binary search vs built-in (n=${size})`,
      }),
    }
  })
}

/**
 * Runs every comparison: the dataset's line totals first, then the
 * synthetic scalability series.
 */
export function runAlgorithmBenchmarks(
  records: readonly SalesRecord[],
  settings: BenchmarkSettings,
  logger: Logger = createSilentLogger()
): AlgorithmBenchmarkReport {
  const config: Partial<BenchmarkConfig> = {
    warmupRuns: settings.warmupRuns,
    measurementRuns: settings.measurementRuns,
  }

  let dataset: AlgorithmBenchmarkReport['dataset'] = null
  let skippedReason: string | undefined

  if (records.length < MIN_BENCHMARK_SIZE) {
    skippedReason = `Not enough data for timing comparisons (${records.length} < ${MIN_BENCHMARK_SIZE} records)`
    logger.warn(skippedReason)
  } else {
    const values = records.map(lineTotalCents)
    const sorted = mergeSort(values, ascending)
    const targets = pickSearchTargets(sorted)

    dataset = {
      size: values.length,
      sort: runSortBenchmark(values, config),
      binarySearch: runSearchBenchmark(sorted, targets, 'binary', config),
      linearSearch: runSearchBenchmark(sorted, targets, 'linear', config),
    }
    logger.info('Dataset comparison finished', {
      size: values.length,
      sortRelative: dataset.sort.relative,
    })
  }

  const scalability = runScalabilityBenchmark(
    settings.syntheticSizes,
    settings.seed,
    config
  )
  logger.info('Scalability series finished', {
    sizes: settings.syntheticSizes,
  })

  for (const result of allComparisons({ dataset, scalability })) {
    if (!result.outputsMatch) {
      logger.error(`Custom output differs from built-in: ${result.name}`)
    }
  }

  return skippedReason === undefined
    ? { dataset, scalability }
    : { dataset, skippedReason, scalability }
}

/**
 * Flattens a report into its comparisons, dataset first.
 */
export function allComparisons(
  report: Pick<AlgorithmBenchmarkReport, 'dataset' | 'scalability'>
): ComparisonResult[] {
  const results: ComparisonResult[] = []
  if (report.dataset) {
    results.push(
      report.dataset.sort,
      report.dataset.binarySearch,
      report.dataset.linearSearch
    )
  }
  for (const point of report.scalability) {
    results.push(point.sort, point.binarySearch)
  }
  return results
}
