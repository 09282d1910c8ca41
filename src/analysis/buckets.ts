import { splitIsoDate } from '../core/normalizers'
import type { DateBucketGranularity } from '../types/config'

const MS_PER_DAY = 86_400_000

function pad(num: number, length: number): string {
  return String(num).padStart(length, '0')
}

/** Midnight UTC of a calendar date; years 0-99 stay as given */
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  return date
}

/**
 * ISO-8601 week of a date: weeks start on Monday and week 1 holds the
 * year's first Thursday, so early January can belong to the previous year.
 *
 * @example
 * ```typescript
 * isoWeek('2024-01-05') // { year: 2024, week: 1 }
 * isoWeek('2023-01-01') // { year: 2022, week: 52 }
 * ```
 */
export function isoWeek(isoDate: string): { year: number; week: number } {
  const { year, month, day } = splitIsoDate(isoDate)
  const date = utcDate(year, month, day)
  const weekday = (date.getUTCDay() + 6) % 7
  const thursday = new Date(date.getTime() + (3 - weekday) * MS_PER_DAY)
  const weekYear = thursday.getUTCFullYear()
  const dayOfYear = (thursday.getTime() - utcDate(weekYear, 1, 1).getTime()) / MS_PER_DAY

  return { year: weekYear, week: Math.floor(dayOfYear / 7) + 1 }
}

/**
 * Maps a `YYYY-MM-DD` date onto its bucket key. Keys of one granularity
 * sort chronologically as plain strings.
 *
 * @example
 * ```typescript
 * bucketKey('2024-05-17', 'month')   // '2024-05'
 * bucketKey('2024-05-17', 'quarter') // '2024-Q2'
 * bucketKey('2024-05-17', 'week')    // '2024-W20'
 * ```
 */
export function bucketKey(
  isoDate: string,
  granularity: DateBucketGranularity
): string {
  switch (granularity) {
    case 'day':
      return isoDate
    case 'week': {
      const { year, week } = isoWeek(isoDate)
      return `${pad(year, 4)}-W${pad(week, 2)}`
    }
    case 'month':
      return isoDate.slice(0, 7)
    case 'quarter': {
      const { year, month } = splitIsoDate(isoDate)
      return `${pad(year, 4)}-Q${Math.floor((month - 1) / 3) + 1}`
    }
    case 'year':
      return isoDate.slice(0, 4)
  }
}
