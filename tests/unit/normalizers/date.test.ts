import { describe, it, expect } from 'vitest'
import {
  formatIsoDate,
  isValidDate,
  normalizeDate,
  parseDateComponents,
  splitIsoDate,
} from '../../../src/core/normalizers/date'

describe('isValidDate', () => {
  it('should validate leap days', () => {
    expect(isValidDate(2024, 2, 29)).toBe(true)
    expect(isValidDate(2000, 2, 29)).toBe(true)
    expect(isValidDate(2023, 2, 29)).toBe(false)
    expect(isValidDate(1900, 2, 29)).toBe(false)
  })

  it('should reject out-of-range months and days', () => {
    expect(isValidDate(2024, 13, 1)).toBe(false)
    expect(isValidDate(2024, 0, 1)).toBe(false)
    expect(isValidDate(2024, 4, 31)).toBe(false)
    expect(isValidDate(2024, 1, 0)).toBe(false)
  })
})

describe('parseDateComponents', () => {
  it('should parse ISO dates and ignore a time part', () => {
    expect(parseDateComponents('2024-01-30')).toEqual({ year: 2024, month: 1, day: 30 })
    expect(parseDateComponents('2024-01-30T10:15:00Z')).toEqual({
      year: 2024,
      month: 1,
      day: 30,
    })
  })

  it('should parse month names', () => {
    expect(parseDateComponents('January 5, 2024')).toEqual({ year: 2024, month: 1, day: 5 })
    expect(parseDateComponents('Jan 30 2024')).toEqual({ year: 2024, month: 1, day: 30 })
    expect(parseDateComponents('5 March 2024')).toEqual({ year: 2024, month: 3, day: 5 })
    expect(parseDateComponents('5 Smarch 2024')).toBeNull()
  })

  it('should read ambiguous slash dates in the requested order', () => {
    expect(parseDateComponents('03/04/2024')).toEqual({ year: 2024, month: 3, day: 4 })
    expect(parseDateComponents('03/04/2024', 'DD/MM/YYYY')).toEqual({
      year: 2024,
      month: 4,
      day: 3,
    })
  })

  it('should detect the order when a part exceeds 12', () => {
    expect(parseDateComponents('30/01/2024')).toEqual({ year: 2024, month: 1, day: 30 })
    expect(parseDateComponents('01/30/2024', 'DD/MM/YYYY')).toEqual({
      year: 2024,
      month: 1,
      day: 30,
    })
  })

  it('should expand two-digit years and parse dotted dates', () => {
    expect(parseDateComponents('1/2/24')).toEqual({ year: 2024, month: 1, day: 2 })
    expect(parseDateComponents('15.02.2024')).toEqual({ year: 2024, month: 2, day: 15 })
  })

  it('should reject partial and impossible dates', () => {
    expect(parseDateComponents('2024-01')).toBeNull()
    expect(parseDateComponents('2024')).toBeNull()
    expect(parseDateComponents('2024-02-30')).toBeNull()
    expect(parseDateComponents('13/13/2024')).toBeNull()
    expect(parseDateComponents('')).toBeNull()
  })
})

describe('normalizeDate', () => {
  it('should produce ISO dates', () => {
    expect(normalizeDate('01/30/2024')).toBe('2024-01-30')
    expect(normalizeDate('January 5, 2024')).toBe('2024-01-05')
    expect(normalizeDate(new Date(Date.UTC(2024, 6, 4)))).toBe('2024-07-04')
  })

  it('should return null for non-dates', () => {
    expect(normalizeDate('2024-01')).toBeNull()
    expect(normalizeDate('soon')).toBeNull()
    expect(normalizeDate(undefined)).toBeNull()
    expect(normalizeDate(new Date('invalid'))).toBeNull()
  })
})

describe('formatIsoDate / splitIsoDate', () => {
  it('should pad components', () => {
    expect(formatIsoDate({ year: 2024, month: 3, day: 7 })).toBe('2024-03-07')
    expect(splitIsoDate('2024-03-07')).toEqual({ year: 2024, month: 3, day: 7 })
  })
})
