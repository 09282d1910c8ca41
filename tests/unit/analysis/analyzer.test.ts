import { describe, it, expect } from 'vitest'
import { analyzeSales, UNSPECIFIED_REGION } from '../../../src/analysis/analyzer'
import { AmountOverflowError, InvalidParameterError } from '../../../src/utils/errors'
import {
  createExampleRecords,
  createRecordSeries,
  createSalesRecord,
} from '../../fixtures/records'

describe('analyzeSales', () => {
  const analysis = analyzeSales(createExampleRecords(), { topN: 10, granularity: 'month' })

  it('should total revenue exactly', () => {
    expect(analysis.totalRevenueCents).toBe(3000)
    expect(analysis.totalQuantity).toBe(3)
    expect(analysis.orderCount).toBe(2)
    expect(analysis.averageOrderValueCents).toBe(1500)
  })

  it('should rank products and customers', () => {
    expect(analysis.topProducts).toEqual([
      { rank: 1, key: 'X', revenueCents: 3000, quantity: 3, orderCount: 2 },
    ])
    expect(analysis.topCustomers[0]).toEqual({
      rank: 1,
      key: 'A',
      revenueCents: 2000,
      quantity: 2,
      orderCount: 1,
    })
  })

  it('should group records without region as unspecified', () => {
    expect(analysis.revenueByRegion).toEqual([
      { rank: 1, key: UNSPECIFIED_REGION, revenueCents: 3000, quantity: 3, orderCount: 2 },
    ])
  })

  it('should report customers, periods and date range', () => {
    expect(analysis.uniqueCustomers).toBe(2)
    expect(analysis.repeatCustomerRate).toBe(0)
    expect(analysis.granularity).toBe('month')
    expect(analysis.revenueByPeriod.map((entry) => entry.period)).toEqual([
      '2024-01',
      '2024-02',
    ])
    expect(analysis.dateRange).toEqual({ first: '2024-01-05', last: '2024-02-01' })
    expect(analysis.customerSegments).toEqual([])
  })

  it('should compute the repeat customer rate', () => {
    const result = analyzeSales(createRecordSeries(4), { topN: 5, granularity: 'day' })
    // customers A, B, C, A: one of three ordered twice
    expect(result.repeatCustomerRate).toBeCloseTo(33.333, 2)
    expect(result.uniqueCustomers).toBe(3)
  })

  it('should truncate rankings to topN', () => {
    const result = analyzeSales(createRecordSeries(12), { topN: 2, granularity: 'month' })
    expect(result.topCustomers).toHaveLength(2)
    expect(result.topProducts).toHaveLength(2)
  })

  it('should rank regions', () => {
    const result = analyzeSales(
      [
        createSalesRecord({ orderId: '1', region: 'West' }),
        createSalesRecord({ orderId: '2', region: 'East', quantity: 3 }),
      ],
      { topN: 10, granularity: 'year' }
    )
    expect(result.revenueByRegion.map((entry) => entry.key)).toEqual(['East', 'West'])
  })

  it('should bin line totals for the distribution chart', () => {
    const bins = analysis.lineTotalDistribution

    expect(bins).toHaveLength(20)
    expect(bins[0]).toEqual({ lowerCents: 1000, upperCents: 1050, count: 1 })
    expect(bins[19]).toEqual({ lowerCents: 1950, upperCents: 2000, count: 1 })
  })

  it('should reject invalid options', () => {
    expect(() =>
      analyzeSales(createExampleRecords(), { topN: 0, granularity: 'month' })
    ).toThrow(InvalidParameterError)
  })

  it('should fail instead of rounding a total past the exact range', () => {
    const records = [
      createSalesRecord({ orderId: '1', unitPriceCents: 5_000_000_000_000_000 }),
      createSalesRecord({ orderId: '2', unitPriceCents: 5_000_000_000_000_000 }),
    ]

    expect(() => analyzeSales(records, { topN: 10, granularity: 'month' })).toThrow(
      AmountOverflowError
    )
    expect(() => analyzeSales(records, { topN: 10, granularity: 'month' })).toThrow(
      'total revenue is too large to compute exactly'
    )
  })
})
