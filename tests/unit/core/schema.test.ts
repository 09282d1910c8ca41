import { describe, it, expect } from 'vitest'
import { createSalesRowSchema, parseSalesRecord } from '../../../src/core/schema'
import { MalformedRowError } from '../../../src/utils/errors'
import { createRawRow } from '../../fixtures/records'

function captureError(fn: () => unknown): MalformedRowError {
  try {
    fn()
  } catch (error) {
    if (error instanceof MalformedRowError) return error
    throw error
  }
  throw new Error('expected a MalformedRowError')
}

describe('parseSalesRecord', () => {
  it('should convert a valid row', () => {
    const record = parseSalesRecord(
      createRawRow({ customer: '  Acme   Corp ', unit_price: '$1,234.50', quantity: '2' }),
      1
    )

    expect(record).toEqual({
      orderId: '1',
      customer: 'Acme Corp',
      product: 'X',
      quantity: 2,
      unitPriceCents: 123450,
      date: '2024-01-05',
      region: 'North',
    })
  })

  it('should omit a blank region', () => {
    const record = parseSalesRecord(createRawRow({ region: '  ' }), 1)
    expect(record).not.toHaveProperty('region')
  })

  it('should accept a row without a region column', () => {
    const row = createRawRow()
    delete row.region
    expect(parseSalesRecord(row, 1).region).toBeUndefined()
  })

  it('should reject a negative quantity', () => {
    const error = captureError(() =>
      parseSalesRecord(createRawRow({ quantity: '-1' }), 3)
    )

    expect(error.reason).toBe('invalid quantity')
    expect(error.field).toBe('quantity')
    expect(error.value).toBe('-1')
    expect(error.rowNumber).toBe(3)
    expect(error.message).toBe(
      'Row 3: invalid quantity (quantity is not a non-negative whole number)'
    )
  })

  it('should report the first offending column', () => {
    const error = captureError(() =>
      parseSalesRecord(createRawRow({ customer: '', date: 'someday' }), 1)
    )
    expect(error.reason).toBe('missing customer')
  })

  it('should map each column to its drop reason', () => {
    const cases: Array<[string, string, string]> = [
      ['order_id', '', 'missing order_id'],
      ['product', ' ', 'missing product'],
      ['unit_price', 'abc', 'invalid unit_price'],
      ['unit_price', '-3.00', 'invalid unit_price'],
      ['date', '2024-02-30', 'invalid date'],
      ['date', '2024-01', 'invalid date'],
    ]

    for (const [column, value, reason] of cases) {
      const error = captureError(() =>
        parseSalesRecord(createRawRow({ [column]: value }), 1)
      )
      expect(error.reason).toBe(reason)
    }
  })

  it('should treat a missing cell as missing', () => {
    const row = createRawRow()
    delete row.quantity
    expect(captureError(() => parseSalesRecord(row, 1)).reason).toBe(
      'invalid quantity'
    )
  })

  it('should honor the slash date order of the schema', () => {
    const schema = createSalesRowSchema('DD/MM/YYYY')
    const record = parseSalesRecord(createRawRow({ date: '03/04/2024' }), 1, schema)
    expect(record.date).toBe('2024-04-03')
  })

  it('should reject a row whose line total cannot be held exactly', () => {
    const error = captureError(() =>
      parseSalesRecord(
        createRawRow({ quantity: '123456789', unit_price: '123456789.01' }),
        2
      )
    )

    expect(error.reason).toBe('line_total out of range')
    expect(error.field).toBe('unit_price')
    expect(error.value).toBe('123456789.01')
    expect(error.message).toBe(
      'Row 2: line_total out of range (quantity × unit_price is too large to total exactly)'
    )
  })

  it('should keep a large line total that is still exact', () => {
    const record = parseSalesRecord(
      createRawRow({ quantity: '1000', unit_price: '1000000.00' }),
      1
    )
    expect(record.quantity * record.unitPriceCents).toBe(100_000_000_000)
  })
})
