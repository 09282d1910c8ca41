/**
 * Pipeline configuration defaults and validation
 * @module config/pipeline-config
 */

import {
  ConfigurationError,
  InvalidParameterError,
  requireNonEmptyString,
  requireNonNegativeInteger,
  requireOneOf,
  requirePositiveInteger,
} from '../utils/errors'
import {
  DATE_BUCKET_GRANULARITIES,
  type PipelineConfig,
  type PipelineOptions,
} from '../types/config'

/**
 * Fixed relative locations used when the pipeline runs without arguments.
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  inputPath: 'data/sales_data.csv',
  outputDir: 'output',
  topN: 10,
  granularity: 'month',
  benchmark: {
    warmupRuns: 1,
    measurementRuns: 3,
    syntheticSizes: [1000, 5000, 20000],
    seed: 42,
  },
}

/**
 * Merges caller options over the defaults and validates the result.
 *
 * @throws {ConfigurationError} When any option is out of range
 *
 * @example
 * ```typescript
 * const config = resolvePipelineConfig({ topN: 5, granularity: 'quarter' })
 * config.inputPath // 'data/sales_data.csv'
 * ```
 */
export function resolvePipelineConfig(
  options: PipelineOptions = {}
): PipelineConfig {
  const config: PipelineConfig = {
    inputPath: options.inputPath ?? DEFAULT_PIPELINE_CONFIG.inputPath,
    outputDir: options.outputDir ?? DEFAULT_PIPELINE_CONFIG.outputDir,
    topN: options.topN ?? DEFAULT_PIPELINE_CONFIG.topN,
    granularity: options.granularity ?? DEFAULT_PIPELINE_CONFIG.granularity,
    benchmark: {
      ...DEFAULT_PIPELINE_CONFIG.benchmark,
      ...options.benchmark,
    },
  }

  try {
    requireNonEmptyString(config.inputPath, 'inputPath')
    requireNonEmptyString(config.outputDir, 'outputDir')
    requirePositiveInteger(config.topN, 'topN')
    requireOneOf(config.granularity, DATE_BUCKET_GRANULARITIES, 'granularity')
    requireNonNegativeInteger(config.benchmark.warmupRuns, 'benchmark.warmupRuns')
    requirePositiveInteger(
      config.benchmark.measurementRuns,
      'benchmark.measurementRuns'
    )
    requireNonNegativeInteger(config.benchmark.seed, 'benchmark.seed')
    config.benchmark.syntheticSizes.forEach((size, index) =>
      requirePositiveInteger(size, `benchmark.syntheticSizes[${index}]`)
    )
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      throw new ConfigurationError(error.message, error.parameterName, {
        value: error.value,
      })
    }
    throw error
  }

  return config
}
