/**
 * Trims whitespace from both ends of a string.
 *
 * @param value - The value to trim
 * @returns Trimmed string, or null if input is null/undefined
 *
 * @example
 * ```typescript
 * trim('  hello  ') // 'hello'
 * trim(null) // null
 * ```
 */
export function trim(value: unknown): string | null {
  if (value == null) return null
  return String(value).trim()
}

/**
 * Collapses runs of whitespace into a single space and trims the ends.
 * Empty results become null so that blank cells read as missing.
 *
 * @example
 * ```typescript
 * normalizeText('  Acme   Corp ') // 'Acme Corp'
 * normalizeText('hello\n\nworld') // 'hello world'
 * normalizeText('   ') // null
 * ```
 */
export function normalizeText(value: unknown): string | null {
  if (value == null) return null
  const text = String(value).replace(/\s+/g, ' ').trim()
  return text.length > 0 ? text : null
}

/**
 * Parses a non-negative whole quantity.
 * Accepts thousands separators and a zero fraction (`'1,200'`, `'3.0'`).
 *
 * @returns The quantity, or null for blanks, negatives, fractions and non-numbers
 *
 * @example
 * ```typescript
 * parseQuantity(' 12 ') // 12
 * parseQuantity('1,200') // 1200
 * parseQuantity('2.5') // null
 * parseQuantity('-1') // null
 * ```
 */
export function parseQuantity(value: unknown): number | null {
  if (value == null) return null
  const text = String(value).trim().replace(/,/g, '')
  const match = /^(\d+)(?:\.0*)?$/.exec(text)
  if (!match) return null

  const quantity = Number(match[1])
  return Number.isSafeInteger(quantity) ? quantity : null
}
