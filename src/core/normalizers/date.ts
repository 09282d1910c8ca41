/**
 * Components of a parsed calendar date.
 */
export interface DateComponents {
  /** Year (4 digits) */
  year: number
  /** Month (1-12) */
  month: number
  /** Day (1-31) */
  day: number
}

/**
 * Day/month order for ambiguous slash dates such as `03/04/2024`.
 */
export type SlashDateOrder = 'MM/DD/YYYY' | 'DD/MM/YYYY'

/**
 * Month name mappings (case-insensitive).
 */
const MONTH_NAMES: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
}

/**
 * Checks month/day ranges, including leap years.
 *
 * @example
 * ```typescript
 * isValidDate(2024, 2, 29)  // true (leap year)
 * isValidDate(2023, 2, 29)  // false
 * isValidDate(2024, 13, 1)  // false
 * ```
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false
  }
  if (month < 1 || month > 12) {
    return false
  }

  const daysInMonth = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (isLeapYear(year)) {
    daysInMonth[1] = 29
  }

  return day >= 1 && day <= daysInMonth[month - 1]
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function pad(num: number, length: number): string {
  return String(num).padStart(length, '0')
}

function expandYear(yearPart: number): number {
  // Two-digit years are taken as 2000s
  return yearPart < 100 ? yearPart + 2000 : yearPart
}

function checked(year: number, month: number, day: number): DateComponents | null {
  return isValidDate(year, month, day) ? { year, month, day } : null
}

/**
 * Parses a full calendar date. Partial dates (`2024-01`, `2024`) are rejected.
 *
 * Recognized forms: `YYYY-MM-DD`, `MM/DD/YYYY` or `DD/MM/YYYY` (a part
 * above 12 decides the order, otherwise `order` applies), `DD.MM.YYYY`,
 * `January 30, 2024` and `30 January 2024`.
 *
 * @example
 * ```typescript
 * parseDateComponents('2024-01-30')       // { year: 2024, month: 1, day: 30 }
 * parseDateComponents('30/01/2024')       // { year: 2024, month: 1, day: 30 }
 * parseDateComponents('Jan 30 2024')      // { year: 2024, month: 1, day: 30 }
 * parseDateComponents('2024-02-30')       // null
 * ```
 */
export function parseDateComponents(
  dateString: string,
  order: SlashDateOrder = 'MM/DD/YYYY'
): DateComponents | null {
  const str = dateString.trim()
  if (!str) return null

  // ISO, optionally with a time part that is ignored
  const isoMatch = str.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+Z?)?$/)
  if (isoMatch) {
    return checked(
      parseInt(isoMatch[1], 10),
      parseInt(isoMatch[2], 10),
      parseInt(isoMatch[3], 10)
    )
  }

  // "January 30, 2024" or "Jan 30 2024"
  const monthFirst = str.match(/^([a-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/i)
  if (monthFirst) {
    const month = MONTH_NAMES[monthFirst[1].toLowerCase()]
    if (month === undefined) return null
    return checked(parseInt(monthFirst[3], 10), month, parseInt(monthFirst[2], 10))
  }

  // "30 January 2024"
  const dayFirst = str.match(/^(\d{1,2})\s+([a-z]+)\.?,?\s+(\d{4})$/i)
  if (dayFirst) {
    const month = MONTH_NAMES[dayFirst[2].toLowerCase()]
    if (month === undefined) return null
    return checked(parseInt(dayFirst[3], 10), month, parseInt(dayFirst[1], 10))
  }

  const slashMatch = str.match(/^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/)
  if (slashMatch) {
    const part1 = parseInt(slashMatch[1], 10)
    const part2 = parseInt(slashMatch[2], 10)
    const year = expandYear(parseInt(slashMatch[3], 10))

    const dayFirstOrder = part1 > 12 || (part2 <= 12 && order === 'DD/MM/YYYY')
    return dayFirstOrder ? checked(year, part2, part1) : checked(year, part1, part2)
  }

  // DD.MM.YYYY (common in Europe)
  const dotMatch = str.match(/^(\d{1,2})\.(\d{1,2})\.(\d{2}|\d{4})$/)
  if (dotMatch) {
    return checked(
      expandYear(parseInt(dotMatch[3], 10)),
      parseInt(dotMatch[2], 10),
      parseInt(dotMatch[1], 10)
    )
  }

  return null
}

/**
 * Formats components as `YYYY-MM-DD`.
 */
export function formatIsoDate(components: DateComponents): string {
  return `${pad(components.year, 4)}-${pad(components.month, 2)}-${pad(components.day, 2)}`
}

/**
 * Normalizes a date value to `YYYY-MM-DD`.
 *
 * @returns The ISO date, or null when the value is blank, partial or not a date
 *
 * @example
 * ```typescript
 * normalizeDate('01/30/2024')        // '2024-01-30'
 * normalizeDate('January 5, 2024')   // '2024-01-05'
 * normalizeDate('2024-01')           // null
 * ```
 */
export function normalizeDate(
  value: unknown,
  order: SlashDateOrder = 'MM/DD/YYYY'
): string | null {
  if (value == null) return null

  if (value instanceof Date) {
    if (isNaN(value.getTime())) return null
    return formatIsoDate({
      year: value.getUTCFullYear(),
      month: value.getUTCMonth() + 1,
      day: value.getUTCDate(),
    })
  }

  const components = parseDateComponents(String(value), order)
  return components ? formatIsoDate(components) : null
}

/**
 * Splits an already normalized `YYYY-MM-DD` string.
 */
export function splitIsoDate(iso: string): DateComponents {
  return {
    year: parseInt(iso.slice(0, 4), 10),
    month: parseInt(iso.slice(5, 7), 10),
    day: parseInt(iso.slice(8, 10), 10),
  }
}
