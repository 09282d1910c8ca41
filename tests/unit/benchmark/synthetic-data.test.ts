import { describe, it, expect } from 'vitest'
import {
  createRandom,
  generateLineTotals,
  pickSearchTargets,
} from '../../../src/benchmark/synthetic-data'

describe('createRandom', () => {
  it('should repeat the sequence for the same seed', () => {
    const a = createRandom(42)
    const b = createRandom(42)
    const first = [a(), a(), a()]

    expect([b(), b(), b()]).toEqual(first)
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })

  it('should differ between seeds', () => {
    expect(createRandom(1)()).not.toBe(createRandom(2)())
  })
})

describe('generateLineTotals', () => {
  it('should generate deterministic integers below the maximum', () => {
    const values = generateLineTotals(100, 7, 500)

    expect(values).toHaveLength(100)
    expect(generateLineTotals(100, 7, 500)).toEqual(values)
    for (const value of values) {
      expect(Number.isInteger(value)).toBe(true)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(500)
    }
  })
})

describe('pickSearchTargets', () => {
  it('should pick evenly spaced targets plus one absent value', () => {
    expect(pickSearchTargets([1, 2, 3, 4, 5], 2)).toEqual([1, 3, 6])
  })

  it('should handle empty input', () => {
    expect(pickSearchTargets([])).toEqual([0])
  })
})
