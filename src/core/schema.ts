/**
 * Row schema: named fields with fixed semantic types, validated with zod.
 * @module core/schema
 */

import { z } from 'zod'
import { MalformedRowError } from '../utils/errors'
import {
  normalizeDate,
  normalizeText,
  parseMoneyToCents,
  parseQuantity,
  type SlashDateOrder,
} from './normalizers'
import {
  SALES_COLUMNS,
  type DropReason,
  type RawRow,
  type SalesColumn,
  type SalesRecord,
} from '../types/record'

/** Columns that can fail validation; region is optional and never does */
type ValidatedColumn = Exclude<SalesColumn, 'region'>

const FIELD_REASONS: Record<ValidatedColumn, DropReason> = {
  order_id: 'missing order_id',
  customer: 'missing customer',
  product: 'missing product',
  quantity: 'invalid quantity',
  unit_price: 'invalid unit_price',
  date: 'invalid date',
}

function coerced<T>(
  parse: (value: unknown) => T | null,
  message: string
) {
  return z.unknown().transform((value, ctx): T => {
    const parsed = parse(value)
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message })
      return z.NEVER
    }
    return parsed
  })
}

/**
 * Builds the row schema. Fields are declared in column order, so the first
 * issue zod reports is the first offending column.
 */
export function createSalesRowSchema(dateOrder: SlashDateOrder = 'MM/DD/YYYY') {
  return z.object({
    order_id: coerced(normalizeText, 'is blank'),
    customer: coerced(normalizeText, 'is blank'),
    product: coerced(normalizeText, 'is blank'),
    quantity: coerced(parseQuantity, 'is not a non-negative whole number'),
    unit_price: coerced(parseMoneyToCents, 'is not a non-negative amount'),
    date: coerced(
      (value: unknown) => normalizeDate(value, dateOrder),
      'is not a calendar date'
    ),
    region: z.unknown().transform((value) => normalizeText(value) ?? undefined),
  })
}

export type SalesRowSchema = ReturnType<typeof createSalesRowSchema>

const defaultSchema = createSalesRowSchema()

function isValidatedColumn(key: unknown): key is ValidatedColumn {
  return key !== 'region' && SALES_COLUMNS.some((column) => column === key)
}

/**
 * Validates one raw row and converts it into a record.
 *
 * @param row - Column name to raw text
 * @param rowNumber - 1-based position of the row among data rows, for error messages
 * @param schema - Row schema, defaults to month-first slash dates
 * @throws {MalformedRowError} Naming the first offending field in column order
 */
export function parseSalesRecord(
  row: RawRow,
  rowNumber: number,
  schema: SalesRowSchema = defaultSchema
): SalesRecord {
  const result = schema.safeParse(row)

  if (!result.success) {
    const issue = result.error.issues[0]
    const key = issue?.path[0]
    const field = isValidatedColumn(key) ? key : 'order_id'
    throw new MalformedRowError(
      rowNumber,
      field,
      FIELD_REASONS[field],
      row[field],
      `${field} ${issue?.message ?? 'is invalid'}`
    )
  }

  const data = result.data
  if (!Number.isSafeInteger(data.quantity * data.unit_price)) {
    throw new MalformedRowError(
      rowNumber,
      'unit_price',
      'line_total out of range',
      row.unit_price,
      'quantity × unit_price is too large to total exactly'
    )
  }

  const record: SalesRecord = {
    orderId: data.order_id,
    customer: data.customer,
    product: data.product,
    quantity: data.quantity,
    unitPriceCents: data.unit_price,
    date: data.date,
    ...(data.region !== undefined ? { region: data.region } : {}),
  }
  return record
}
