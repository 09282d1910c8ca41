import { copyFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import {
  EmptyDatasetError,
  MalformedDatasetError,
  MissingFileError,
  cleanRows,
  loadSalesDataset,
  resolvePipelineConfig,
  runPipeline,
} from '../../src'

const quickBenchmark = {
  warmupRuns: 0,
  measurementRuns: 1,
  syntheticSizes: [50],
  seed: 1,
}

describe('runPipeline', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sales-pipeline-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function configFor(inputPath: string) {
    return resolvePipelineConfig({
      inputPath,
      outputDir: join(dir, 'output'),
      benchmark: quickBenchmark,
    })
  }

  it('should run the bundled sample dataset end to end', () => {
    const input = join(dir, 'sales_data.csv')
    copyFileSync('data/sales_data.csv', input)

    const result = runPipeline(configFor(input))

    expect(result.cleaning.totalRows).toBe(41)
    expect(result.cleaning.reasons).toEqual({
      'missing order_id': 1,
      'missing customer': 1,
      'invalid quantity': 2,
      'invalid unit_price': 1,
      'invalid date': 2,
      'duplicate order_id': 1,
    })
    expect(result.cleaning.records).toHaveLength(33)
    expect(result.benchmarks.dataset?.size).toBe(33)
    expect(result.analysis.topCustomers).toHaveLength(8)
    expect(result.analysis.revenueByPeriod.map((entry) => entry.period)).toEqual([
      '2024-01',
      '2024-02',
      '2024-03',
      '2024-04',
    ])

    const report = readFileSync(result.files.report, 'utf8')
    expect(report.startsWith('Sales Analytics Summary\n')).toBe(true)
    expect(report.split('\n')).toContain('Rows dropped: 8')
  })

  it('should write a cleaned file that cleans to itself', () => {
    const input = join(dir, 'sales_data.csv')
    copyFileSync('data/sales_data.csv', input)

    const result = runPipeline(configFor(input))
    const reloaded = cleanRows(loadSalesDataset(result.files.cleanedData).rows)

    expect(reloaded.dropped).toBe(0)
    expect(reloaded.records).toEqual(result.cleaning.records)
  })

  it('should produce identical reports apart from timings', () => {
    const input = join(dir, 'two.csv')
    writeFileSync(
      input,
      'order_id,customer,product,quantity,unit_price,date\n' +
        '1,A,X,2,10.0,2024-01-05\n' +
        '2,B,X,1,10.0,2024-02-01\n'
    )

    const first = runPipeline(configFor(input))
    const firstReport = readFileSync(first.files.report, 'utf8')
    const second = runPipeline(configFor(input))
    const secondReport = readFileSync(second.files.report, 'utf8')

    const withoutTimings = (text: string) =>
      text.split('\n').filter((line) => !/ (ms|μs|s|min)\b/.test(line))

    expect(withoutTimings(secondReport)).toEqual(withoutTimings(firstReport))
    expect(first.analysis.totalRevenueCents).toBe(3000)
    expect(readFileSync(first.files.topProducts, 'utf8')).toBe(
      'rank,product,revenue\n1,X,30.00\n'
    )
  })

  it('should fail on a missing input file', () => {
    expect(() => runPipeline(configFor(join(dir, 'absent.csv')))).toThrow(MissingFileError)
  })

  it('should fail on missing columns', () => {
    const input = join(dir, 'bad.csv')
    writeFileSync(input, 'id,name\n1,A\n')
    expect(() => runPipeline(configFor(input))).toThrow(MalformedDatasetError)
  })

  it('should fail when every row is dropped', () => {
    const input = join(dir, 'empty.csv')
    writeFileSync(
      input,
      'order_id,customer,product,quantity,unit_price,date\n1,A,X,-1,10.0,2024-01-05\n'
    )
    expect(() => runPipeline(configFor(input))).toThrow(EmptyDatasetError)
  })
})
