/**
 * Command-line entry point: `npm start -- [options]`.
 * @module cli
 */

import { pathToFileURL } from 'node:url'
import { parseCliArgs, USAGE } from './config/cli-options'
import { resolvePipelineConfig } from './config/pipeline-config'
import { runPipeline } from './pipeline'
import { isSalesPipelineError } from './utils/errors'
import {
  createConsoleLogger,
  defaultLogger,
  type Logger,
  type LogLevel,
} from './utils/logger'

export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
  /** Builds the run logger for the level chosen on the command line */
  createLogger: (level: LogLevel) => Logger
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  createLogger: (level) =>
    level === 'info' ? defaultLogger : createConsoleLogger(level),
}

/**
 * Runs the pipeline for the given arguments.
 *
 * @returns Process exit code: 0 on success, 1 on a fatal error
 */
export function main(argv: string[], io: CliIO = defaultIO): number {
  try {
    const options = parseCliArgs(argv)
    if (options.help) {
      io.out(USAGE)
      return 0
    }

    const config = resolvePipelineConfig(options.pipeline)
    const result = runPipeline(config, { logger: io.createLogger(options.logLevel) })

    io.out(`Report written to ${result.files.report}`)
    return 0
  } catch (error) {
    if (isSalesPipelineError(error)) {
      io.err(`sales-pipeline: ${error.message}`)
      return 1
    }
    io.err(
      `sales-pipeline: unexpected failure: ${
        error instanceof Error ? error.stack ?? error.message : String(error)
      }`
    )
    return 1
  }
}

const entry = process.argv[1]
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = main(process.argv.slice(2))
}
