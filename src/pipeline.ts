/**
 * End-to-end batch run: load, clean, persist, analyze, benchmark, export.
 * @module pipeline
 */

import { join } from 'node:path'
import { analyzeSales, type SalesAnalysis } from './analysis'
import {
  runAlgorithmBenchmarks,
  type AlgorithmBenchmarkReport,
} from './benchmark'
import { cleanRows, requireRecords, type CleaningResult } from './core/cleaner'
import {
  loadSalesDataset,
  writeCleanedRecords,
  type DatasetMetadata,
} from './core/dataset-loader'
import { exportResults, type ExportedFiles } from './export'
import type { PipelineConfig } from './types/config'
import {
  createPrefixedLogger,
  createSilentLogger,
  type Logger,
} from './utils/logger'

export const CLEANED_DATA_FILE = 'sales_clean.csv'

export interface PipelineRunOptions {
  logger?: Logger
}

export interface StageTimings {
  loadMs: number
  cleanMs: number
  analyzeMs: number
  benchmarkMs: number
  exportMs: number
  totalMs: number
}

export interface PipelineResult {
  config: PipelineConfig
  dataset: DatasetMetadata
  cleaning: CleaningResult
  analysis: SalesAnalysis
  benchmarks: AlgorithmBenchmarkReport
  files: ExportedFiles & { cleanedData: string }
  timings: StageTimings
}

function timed<T>(fn: () => T): [T, number] {
  const startTime = performance.now()
  const result = fn()
  return [result, performance.now() - startTime]
}

/**
 * Runs every stage in order. Any fatal error stops the run and propagates;
 * outputs already written by earlier stages stay on disk.
 *
 * @throws {MissingFileError} When the input file does not exist
 * @throws {MalformedDatasetError} When the input cannot be parsed
 * @throws {EmptyDatasetError} When no row survives cleaning
 *
 * @example
 * ```typescript
 * const result = runPipeline(resolvePipelineConfig(), { logger: createConsoleLogger() })
 * console.log(result.files.report)
 * ```
 */
export function runPipeline(
  config: PipelineConfig,
  options: PipelineRunOptions = {}
): PipelineResult {
  const logger = options.logger ?? createSilentLogger()
  const runStart = performance.now()

  const loaderLogger = createPrefixedLogger('loader', logger)
  const [dataset, loadMs] = timed(() => loadSalesDataset(config.inputPath))
  loaderLogger.info(`Read ${dataset.metadata.rowCount} rows`, {
    path: dataset.path,
    columns: dataset.metadata.columns,
  })

  const cleanerLogger = createPrefixedLogger('cleaner', logger)
  const [cleaning, cleanMs] = timed(() =>
    cleanRows(dataset.rows, { logger: cleanerLogger })
  )
  const records = requireRecords(cleaning)

  const cleanedData = join(config.outputDir, CLEANED_DATA_FILE)
  writeCleanedRecords(cleanedData, records)
  cleanerLogger.info('Wrote cleaned dataset', { path: cleanedData })

  const analyzerLogger = createPrefixedLogger('analyzer', logger)
  const [analysis, analyzeMs] = timed(() =>
    analyzeSales(records, { topN: config.topN, granularity: config.granularity })
  )
  analyzerLogger.info('Analysis finished', {
    orders: analysis.orderCount,
    periods: analysis.revenueByPeriod.length,
    outliers: analysis.outliers.orders.length,
  })

  const benchmarkLogger = createPrefixedLogger('benchmark', logger)
  const [benchmarks, benchmarkMs] = timed(() =>
    runAlgorithmBenchmarks(records, config.benchmark, benchmarkLogger)
  )

  const exporterLogger = createPrefixedLogger('exporter', logger)
  const [exported, exportMs] = timed(() =>
    exportResults(
      {
        outputDir: config.outputDir,
        sourcePath: config.inputPath,
        cleanedDataPath: cleanedData,
        cleaning: {
          totalRows: cleaning.totalRows,
          kept: cleaning.records.length,
          dropped: cleaning.dropped,
          reasons: cleaning.reasons,
        },
        analysis,
        benchmarks,
      },
      exporterLogger
    )
  )

  const timings: StageTimings = {
    loadMs,
    cleanMs,
    analyzeMs,
    benchmarkMs,
    exportMs,
    totalMs: performance.now() - runStart,
  }
  logger.debug('Stage timings', { ...timings })

  return {
    config,
    dataset: dataset.metadata,
    cleaning,
    analysis,
    benchmarks,
    files: { ...exported, cleanedData },
    timings,
  }
}
