import { describe, it, expect } from 'vitest'
import {
  normalizeText,
  parseQuantity,
  trim,
} from '../../../src/core/normalizers/basic'

describe('trim', () => {
  it('should trim both ends', () => {
    expect(trim('  hello  ')).toBe('hello')
  })

  it('should return null for null or undefined', () => {
    expect(trim(null)).toBeNull()
    expect(trim(undefined)).toBeNull()
  })
})

describe('normalizeText', () => {
  it('should collapse inner whitespace', () => {
    expect(normalizeText('  Adventure   Works ')).toBe('Adventure Works')
    expect(normalizeText('hello\n\tworld')).toBe('hello world')
  })

  it('should treat blank text as missing', () => {
    expect(normalizeText('')).toBeNull()
    expect(normalizeText('   ')).toBeNull()
    expect(normalizeText(undefined)).toBeNull()
  })
})

describe('parseQuantity', () => {
  it('should parse whole numbers', () => {
    expect(parseQuantity('12')).toBe(12)
    expect(parseQuantity(' 7 ')).toBe(7)
    expect(parseQuantity('0')).toBe(0)
  })

  it('should accept thousands separators and a zero fraction', () => {
    expect(parseQuantity('1,200')).toBe(1200)
    expect(parseQuantity('3.0')).toBe(3)
    expect(parseQuantity('3.')).toBe(3)
  })

  it('should reject negatives, fractions and text', () => {
    expect(parseQuantity('-1')).toBeNull()
    expect(parseQuantity('2.5')).toBeNull()
    expect(parseQuantity('two')).toBeNull()
    expect(parseQuantity('')).toBeNull()
    expect(parseQuantity(undefined)).toBeNull()
  })
})
