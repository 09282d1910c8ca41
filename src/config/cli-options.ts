/**
 * Command-line flags for the pipeline entry point. All flags are optional.
 * @module config/cli-options
 */

import { parseArgs } from 'node:util'
import {
  ConfigurationError,
  InvalidParameterError,
  requireOneOf,
} from '../utils/errors'
import { DATE_BUCKET_GRANULARITIES, type PipelineOptions } from '../types/config'
import { LOG_LEVELS, type LogLevel } from '../utils/logger'

export interface CliOptions {
  pipeline: PipelineOptions
  /** Minimum level the run logger prints */
  logLevel: LogLevel
  help: boolean
}

export const USAGE = `Usage: sales-pipeline [options]

Options:
  --input <path>         raw sales CSV (default: data/sales_data.csv)
  --output <dir>         output directory (default: output)
  --top <n>              length of the top customer/product rankings (default: 10)
  --granularity <unit>   day | week | month | quarter | year (default: month)
  --trials <n>           measured benchmark runs per implementation (default: 3)
  --log-level <level>    debug | info | warn | error (default: info)
  --quiet                same as --log-level warn
  -h, --help             show this message`

function parseInteger(flag: string, raw: string): number {
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`--${flag} must be an integer, got '${raw}'`, flag)
  }
  return value
}

function parseChoice<T>(flag: string, raw: string, choices: readonly T[]): T {
  try {
    return requireOneOf(raw, choices, flag)
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      throw new ConfigurationError(error.message, flag)
    }
    throw error
  }
}

/**
 * Parses process arguments (without the node and script entries).
 *
 * @throws {ConfigurationError} On unknown flags or malformed values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  let values: {
    input?: string
    output?: string
    top?: string
    granularity?: string
    trials?: string
    'log-level'?: string
    quiet?: boolean
    help?: boolean
  }

  try {
    values = parseArgs({
      args: argv,
      options: {
        input: { type: 'string' },
        output: { type: 'string' },
        top: { type: 'string' },
        granularity: { type: 'string' },
        trials: { type: 'string' },
        'log-level': { type: 'string' },
        quiet: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values
  } catch (error) {
    throw new ConfigurationError(
      error instanceof Error ? error.message : String(error)
    )
  }

  const pipeline: PipelineOptions = {}
  if (values.input !== undefined) pipeline.inputPath = values.input
  if (values.output !== undefined) pipeline.outputDir = values.output
  if (values.top !== undefined) pipeline.topN = parseInteger('top', values.top)
  if (values.trials !== undefined) {
    pipeline.benchmark = { measurementRuns: parseInteger('trials', values.trials) }
  }
  if (values.granularity !== undefined) {
    pipeline.granularity = parseChoice(
      'granularity',
      values.granularity,
      DATE_BUCKET_GRANULARITIES
    )
  }

  let logLevel: LogLevel = values.quiet ? 'warn' : 'info'
  if (values['log-level'] !== undefined) {
    logLevel = parseChoice('log-level', values['log-level'], LOG_LEVELS)
  }

  return {
    pipeline,
    logLevel,
    help: values.help ?? false,
  }
}
