/**
 * Cleaning: validation, coercion and de-duplication of raw rows.
 * @module core/cleaner
 */

import { EmptyDatasetError, MalformedRowError } from '../utils/errors'
import { createSilentLogger, type Logger } from '../utils/logger'
import { createSalesRowSchema, parseSalesRecord } from './schema'
import type { SlashDateOrder } from './normalizers'
import type { DropReason, RawRow, SalesRecord } from '../types/record'

export interface CleaningOptions {
  logger?: Logger
  /** Order for ambiguous slash dates (default: month first) */
  dateOrder?: SlashDateOrder
}

export interface CleaningResult {
  records: SalesRecord[]
  totalRows: number
  dropped: number
  /** Number of dropped rows per reason; reasons that never occurred are absent */
  reasons: Partial<Record<DropReason, number>>
  /** One error per dropped row, in input order */
  errors: MalformedRowError[]
}

/**
 * Converts raw rows into records.
 *
 * Rows that fail validation are dropped and tallied. When an order id
 * repeats, the first occurrence is kept and later ones are dropped.
 * Row numbers in errors are 1-based positions among data rows.
 */
export function cleanRows(
  rows: readonly RawRow[],
  options: CleaningOptions = {}
): CleaningResult {
  const logger = options.logger ?? createSilentLogger()
  const schema = createSalesRowSchema(options.dateOrder)

  const records: SalesRecord[] = []
  const errors: MalformedRowError[] = []
  const reasons: Partial<Record<DropReason, number>> = {}
  const firstSeen = new Map<string, number>()

  const drop = (error: MalformedRowError) => {
    errors.push(error)
    reasons[error.reason] = (reasons[error.reason] ?? 0) + 1
    logger.warn(`Dropped ${error.message}`, {
      field: error.field,
      value: error.value,
    })
  }

  rows.forEach((row, index) => {
    const rowNumber = index + 1

    let record: SalesRecord
    try {
      record = parseSalesRecord(row, rowNumber, schema)
    } catch (error) {
      if (error instanceof MalformedRowError) {
        drop(error)
        return
      }
      throw error
    }

    const previous = firstSeen.get(record.orderId)
    if (previous !== undefined) {
      drop(
        new MalformedRowError(
          rowNumber,
          'order_id',
          'duplicate order_id',
          record.orderId,
          `first seen in row ${previous}`
        )
      )
      return
    }

    firstSeen.set(record.orderId, rowNumber)
    records.push(record)
  })

  logger.info(`Kept ${records.length} of ${rows.length} rows`, {
    dropped: errors.length,
    reasons,
  })

  return {
    records,
    totalRows: rows.length,
    dropped: errors.length,
    reasons,
    errors,
  }
}

/**
 * Returns the cleaned records, failing when none survived.
 *
 * @throws {EmptyDatasetError} When every row was dropped or there were no rows
 */
export function requireRecords(result: CleaningResult): SalesRecord[] {
  if (result.records.length === 0) {
    throw new EmptyDatasetError(result.totalRows, { reasons: result.reasons })
  }
  return result.records
}
