/**
 * One raw input row: column name to raw cell text.
 * Cells missing from a short line are `undefined`.
 */
export type RawRow = Record<string, string | undefined>

/**
 * Column names of the delimited input and cleaned output, in file order.
 */
export const SALES_COLUMNS = [
  'order_id',
  'customer',
  'product',
  'quantity',
  'unit_price',
  'date',
  'region',
] as const

export type SalesColumn = (typeof SALES_COLUMNS)[number]

/**
 * Columns every input file must carry. `region` may be absent.
 */
export const REQUIRED_COLUMNS: readonly SalesColumn[] = SALES_COLUMNS.filter(
  (column) => column !== 'region'
)

/**
 * Reasons a row is dropped during cleaning. Used as tally keys.
 */
export type DropReason =
  | 'missing order_id'
  | 'missing customer'
  | 'missing product'
  | 'invalid quantity'
  | 'invalid unit_price'
  | 'invalid date'
  | 'line_total out of range'
  | 'duplicate order_id'

/**
 * A validated sales transaction.
 *
 * Money is held in integer cents so that line totals and sums are exact.
 * Records are never mutated after cleaning.
 */
export interface SalesRecord {
  /** Unique within a cleaned dataset */
  readonly orderId: string
  readonly customer: string
  readonly product: string
  /** Non-negative integer */
  readonly quantity: number
  /** Non-negative unit price in cents */
  readonly unitPriceCents: number
  /** Calendar date as `YYYY-MM-DD` */
  readonly date: string
  readonly region?: string
}

/**
 * Line total of a record in cents (`quantity × unit price`).
 * Cleaning only keeps records whose line total is a safe integer.
 */
export function lineTotalCents(record: SalesRecord): number {
  return record.quantity * record.unitPriceCents
}
