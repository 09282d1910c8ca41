import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { main, type CliIO } from '../../src/cli'
import { USAGE } from '../../src/config/cli-options'
import { createSilentLogger, type LogLevel } from '../../src/utils/logger'

function createIO() {
  const stdout: string[] = []
  const stderr: string[] = []
  const levels: LogLevel[] = []
  const io: CliIO = {
    out: (line) => {
      stdout.push(line)
    },
    err: (line) => {
      stderr.push(line)
    },
    createLogger: (level) => {
      levels.push(level)
      return createSilentLogger()
    },
  }
  return { io, stdout, stderr, levels }
}

describe('main', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sales-cli-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should print usage for --help', () => {
    const { io, stdout } = createIO()
    expect(main(['--help'], io)).toBe(0)
    expect(stdout).toEqual([USAGE])
  })

  it('should run the pipeline and report where the summary went', () => {
    const input = join(dir, 'in.csv')
    const output = join(dir, 'out')
    writeFileSync(
      input,
      'order_id,customer,product,quantity,unit_price,date\n1,A,X,2,10.0,2024-01-05\n'
    )

    const { io, stdout, stderr, levels } = createIO()
    const code = main(['--input', input, '--output', output, '--trials', '1', '--quiet'], io)

    expect(code).toBe(0)
    expect(stderr).toEqual([])
    expect(stdout).toEqual([`Report written to ${join(output, 'summary_report.txt')}`])
    expect(levels).toEqual(['warn'])
    expect(existsSync(join(output, 'sales_clean.csv'))).toBe(true)
  })

  it('should exit with 1 and one line on a missing file', () => {
    const input = join(dir, 'absent.csv')
    const { io, stderr } = createIO()

    expect(main(['--input', input], io)).toBe(1)
    expect(stderr).toEqual([`sales-pipeline: Input file not found: ${input}`])
  })

  it('should exit with 1 on a malformed flag', () => {
    const { io, stderr } = createIO()

    expect(main(['--top', 'ten'], io)).toBe(1)
    expect(stderr).toEqual(["sales-pipeline: --top must be an integer, got 'ten'"])
  })
})
