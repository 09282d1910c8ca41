import { afterEach, describe, it, expect, vi } from 'vitest'
import {
  createConsoleLogger,
  createPrefixedLogger,
  createSilentLogger,
  defaultLogger,
  type Logger,
} from '../../../src/utils/logger'

function createRecordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = []
  return {
    lines,
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  }
}

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should prefix messages with their level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const logger = createConsoleLogger('debug')
    logger.info('hello', { rows: 2 })
    logger.warn('careful')

    expect(log).toHaveBeenCalledWith('[INFO] hello', { rows: 2 })
    expect(warn).toHaveBeenCalledWith('[WARN] careful', '')
  })

  it('should drop messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const logger = createConsoleLogger('warn')
    logger.debug('hidden')
    logger.info('hidden')
    logger.error('shown')

    expect(log).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledWith('[ERROR] shown', '')
  })

  it('should log from info upward by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    defaultLogger.debug('hidden')
    defaultLogger.info('shown')

    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('[INFO] shown', '')
  })
})

describe('createPrefixedLogger', () => {
  it('should prefix every level with the stage name', () => {
    const base = createRecordingLogger()
    const logger = createPrefixedLogger('cleaner', base)

    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')

    expect(base.lines).toEqual([
      'debug [cleaner] a',
      'info [cleaner] b',
      'warn [cleaner] c',
      'error [cleaner] d',
    ])
  })
})

describe('createSilentLogger', () => {
  it('should accept calls without output', () => {
    const log = vi.spyOn(console, 'log')
    createSilentLogger().info('nothing')
    expect(log).not.toHaveBeenCalled()
    log.mockRestore()
  })
})
