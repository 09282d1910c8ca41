import { describe, it, expect } from 'vitest'
import { parseCliArgs } from '../../../src/config/cli-options'
import { ConfigurationError } from '../../../src/utils/errors'

describe('parseCliArgs', () => {
  it('should need no arguments', () => {
    expect(parseCliArgs([])).toEqual({ pipeline: {}, logLevel: 'info', help: false })
  })

  it('should map flags onto pipeline options', () => {
    const options = parseCliArgs([
      '--input',
      'in.csv',
      '--output=out',
      '--top',
      '5',
      '--granularity',
      'week',
      '--trials',
      '7',
      '--quiet',
    ])

    expect(options).toEqual({
      pipeline: {
        inputPath: 'in.csv',
        outputDir: 'out',
        topN: 5,
        granularity: 'week',
        benchmark: { measurementRuns: 7 },
      },
      logLevel: 'warn',
      help: false,
    })
  })

  it('should take an explicit log level over --quiet', () => {
    expect(parseCliArgs(['--log-level', 'debug']).logLevel).toBe('debug')
    expect(parseCliArgs(['--quiet', '--log-level=error']).logLevel).toBe('error')
  })

  it('should reject unknown log levels', () => {
    expect(() => parseCliArgs(['--log-level', 'trace'])).toThrow(
      "Invalid parameter 'log-level': must be one of: debug, info, warn, error"
    )
  })

  it('should recognize help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true)
  })

  it('should reject malformed numbers', () => {
    expect(() => parseCliArgs(['--top', 'ten'])).toThrow(
      "--top must be an integer, got 'ten'"
    )
  })

  it('should reject unknown granularities', () => {
    expect(() => parseCliArgs(['--granularity', 'hour'])).toThrow(
      "Invalid parameter 'granularity': must be one of: day, week, month, quarter, year"
    )
  })

  it('should reject unknown flags and positionals', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(ConfigurationError)
    expect(() => parseCliArgs(['data.csv'])).toThrow(ConfigurationError)
  })
})
