import { describe, it, expect } from 'vitest'
import {
  ascending,
  compareBy,
  descending,
  naturalOrder,
  thenBy,
} from '../../../src/algorithms/comparators'

describe('ascending / descending', () => {
  it('should order numbers and strings', () => {
    expect(ascending(1, 2)).toBe(-1)
    expect(ascending(2, 1)).toBe(1)
    expect(ascending('b', 'b')).toBe(0)
    expect(descending(1, 2)).toBe(1)
  })

  it('should compare strings by code units', () => {
    expect(ascending('Zed', 'apple')).toBe(-1)
  })
})

describe('naturalOrder', () => {
  it('should compare numbers numerically', () => {
    expect(naturalOrder(10, 9)).toBe(1)
  })

  it('should compare other values by their string form', () => {
    expect(naturalOrder('10', '9')).toBe(-1)
  })
})

describe('compareBy / thenBy', () => {
  interface Item {
    name: string
    score: number
  }

  it('should break ties with later comparators', () => {
    const compare = thenBy<Item>(
      compareBy((item: Item) => item.score, descending),
      compareBy((item: Item) => item.name)
    )

    expect(compare({ name: 'a', score: 1 }, { name: 'b', score: 2 })).toBe(1)
    expect(compare({ name: 'a', score: 2 }, { name: 'b', score: 2 })).toBe(-1)
    expect(compare({ name: 'a', score: 2 }, { name: 'a', score: 2 })).toBe(0)
  })
})
