/**
 * Money parsing and formatting in integer cents
 * @module core/normalizers/money
 */

import { AmountOverflowError } from '../../utils/errors'

const CURRENCY_PREFIX = /^[$€£]/

/**
 * Parses a money-like value into integer cents.
 *
 * Surrounding spaces, one leading currency symbol and thousands separators
 * are accepted. Digits past the second decimal place round half-up.
 * Negative amounts are rejected.
 *
 * @returns Cents, or null when the value is blank, negative or not a number
 *
 * @example
 * ```typescript
 * parseMoneyToCents('10') // 1000
 * parseMoneyToCents('$1,234.50') // 123450
 * parseMoneyToCents('0.125') // 13
 * parseMoneyToCents('-5') // null
 * parseMoneyToCents('ten') // null
 * ```
 */
export function parseMoneyToCents(value: unknown): number | null {
  if (value == null) return null

  const text = String(value)
    .trim()
    .replace(CURRENCY_PREFIX, '')
    .replace(/,/g, '')
    .trim()

  const match = /^(\d*)(?:\.(\d*))?$/.exec(text)
  if (!match || !/\d/.test(text)) return null

  const whole = match[1] || '0'
  const fraction = match[2] ?? ''

  let cents = Number(whole) * 100 + Number(`${fraction}00`.slice(0, 2))
  if (fraction.length > 2 && fraction.charAt(2) >= '5') {
    cents += 1
  }

  return Number.isSafeInteger(cents) ? cents : null
}

/**
 * Formats cents as a plain decimal amount with two places.
 *
 * @example
 * ```typescript
 * formatCents(123450) // '1234.50'
 * formatCents(5) // '0.05'
 * ```
 */
export function formatCents(cents: number): string {
  const rounded = Math.round(cents)
  const sign = rounded < 0 ? '-' : ''
  const abs = Math.abs(rounded)
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`
}

/**
 * Divides an amount in cents, rounding half-up to whole cents.
 * Returns 0 when dividing by zero.
 */
export function divideCents(cents: number, divisor: number): number {
  if (divisor === 0) return 0
  return Math.round(cents / divisor)
}

/**
 * Adds two integer amounts, failing instead of losing precision.
 *
 * @param label - Names the total in the error, e.g. `revenue`
 * @throws {AmountOverflowError} When the sum is not a safe integer
 *
 * @example
 * ```typescript
 * addExact(1000, 250, 'revenue') // 1250
 * addExact(Number.MAX_SAFE_INTEGER, 1, 'revenue') // throws
 * ```
 */
export function addExact(total: number, amount: number, label: string): number {
  const sum = total + amount
  if (!Number.isSafeInteger(sum)) {
    throw new AmountOverflowError(label, { previous: total, amount })
  }
  return sum
}
