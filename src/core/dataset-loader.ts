/**
 * Reading raw sales rows and persisting cleaned records as delimited text.
 * @module core/dataset-loader
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import { MalformedDatasetError, MissingFileError } from '../utils/errors'
import { formatCents } from './normalizers'
import {
  REQUIRED_COLUMNS,
  SALES_COLUMNS,
  type RawRow,
  type SalesColumn,
  type SalesRecord,
} from '../types/record'

export interface DatasetMetadata {
  rowCount: number
  columns: string[]
  loadTimeMs: number
}

export interface LoadedDataset {
  path: string
  rows: RawRow[]
  metadata: DatasetMetadata
}

export interface CSVParseOptions {
  delimiter?: string
}

const parsedRowsSchema = z.array(z.record(z.string()))

/**
 * Parses delimited text with a header row into raw rows.
 * Header names are trimmed and lower-cased; blank lines are skipped.
 *
 * @param source - Label used in error messages (usually the file path)
 * @throws {MalformedDatasetError} When the text cannot be decoded or required columns are missing
 */
export function parseSalesCSV(
  content: string,
  source: string,
  options: CSVParseOptions = {}
): { rows: RawRow[]; columns: string[] } {
  const { delimiter = ',' } = options
  let columns: string[] = []

  let parsed: unknown
  try {
    parsed = parse(content, {
      delimiter,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      columns: (header: string[]) => {
        columns = header.map((name) => name.trim().toLowerCase())
        return columns
      },
    })
  } catch (error) {
    throw new MalformedDatasetError(
      source,
      error instanceof Error ? error.message : String(error)
    )
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column))
  if (missing.length > 0) {
    throw new MalformedDatasetError(
      source,
      `missing required column(s): ${missing.join(', ')}`,
      { columns }
    )
  }

  const rows = parsedRowsSchema.safeParse(parsed)
  if (!rows.success) {
    throw new MalformedDatasetError(source, 'rows did not decode to text cells')
  }

  return { rows: rows.data, columns }
}

/**
 * Loads a raw sales file.
 *
 * @throws {MissingFileError} When the file does not exist
 * @throws {MalformedDatasetError} When the content is unusable
 */
export function loadSalesDataset(
  path: string,
  options: CSVParseOptions = {}
): LoadedDataset {
  if (!existsSync(path)) {
    throw new MissingFileError(path)
  }

  const startTime = performance.now()
  const content = readFileSync(path, 'utf8')
  const { rows, columns } = parseSalesCSV(content, path, options)
  const loadTimeMs = performance.now() - startTime

  return {
    path,
    rows,
    metadata: {
      rowCount: rows.length,
      columns,
      loadTimeMs,
    },
  }
}

/**
 * Converts a record back to the delimited column layout.
 */
export function recordToRow(record: SalesRecord): Record<SalesColumn, string> {
  return {
    order_id: record.orderId,
    customer: record.customer,
    product: record.product,
    quantity: String(record.quantity),
    unit_price: formatCents(record.unitPriceCents),
    date: record.date,
    region: record.region ?? '',
  }
}

/**
 * Serializes records with the standard header.
 */
export function formatSalesCSV(records: readonly SalesRecord[]): string {
  return stringify(records.map(recordToRow), {
    header: true,
    columns: [...SALES_COLUMNS],
  })
}

/**
 * Persists cleaned records, creating the parent directory when needed.
 */
export function writeCleanedRecords(
  path: string,
  records: readonly SalesRecord[]
): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, formatSalesCSV(records), 'utf8')
}
