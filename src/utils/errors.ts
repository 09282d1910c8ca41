/**
 * Central error classes and validation utilities for the sales pipeline
 * @module utils/errors
 */

import type { DropReason, SalesColumn } from '../types/record'

/**
 * Base error class for all pipeline errors
 */
export class SalesPipelineError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'SalesPipelineError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a single input row cannot be turned into a record.
 * Cleaning catches it, drops the row and tallies `reason`.
 */
export class MalformedRowError extends SalesPipelineError {
  public readonly rowNumber: number
  public readonly field: SalesColumn
  public readonly reason: DropReason
  public readonly value: unknown

  constructor(
    rowNumber: number,
    field: SalesColumn,
    reason: DropReason,
    value: unknown,
    detail?: string
  ) {
    super(
      `Row ${rowNumber}: ${reason}${detail ? ` (${detail})` : ''}`,
      'MALFORMED_ROW',
      { rowNumber, field, reason, value }
    )
    this.name = 'MalformedRowError'
    this.rowNumber = rowNumber
    this.field = field
    this.reason = reason
    this.value = value
  }
}

/**
 * Error thrown when the input file does not exist
 */
export class MissingFileError extends SalesPipelineError {
  public readonly path: string

  constructor(path: string, context?: Record<string, unknown>) {
    super(`Input file not found: ${path}`, 'MISSING_FILE', {
      path,
      ...context,
    })
    this.name = 'MissingFileError'
    this.path = path
  }
}

/**
 * Error thrown when the input as a whole is unusable
 * (missing required columns, undecodable delimited text)
 */
export class MalformedDatasetError extends SalesPipelineError {
  public readonly path: string

  constructor(path: string, reason: string, context?: Record<string, unknown>) {
    super(`Malformed dataset '${path}': ${reason}`, 'MALFORMED_DATASET', {
      path,
      reason,
      ...context,
    })
    this.name = 'MalformedDatasetError'
    this.path = path
  }
}

/**
 * Error thrown when cleaning leaves no records to analyze
 */
export class EmptyDatasetError extends SalesPipelineError {
  public readonly totalRows: number

  constructor(totalRows: number, context?: Record<string, unknown>) {
    super(
      totalRows === 0
        ? 'Dataset contains no rows'
        : `All ${totalRows} rows were dropped during cleaning`,
      'EMPTY_DATASET',
      { totalRows, ...context }
    )
    this.name = 'EmptyDatasetError'
    this.totalRows = totalRows
  }
}

/**
 * Error thrown when a running total leaves the exact integer range
 */
export class AmountOverflowError extends SalesPipelineError {
  public readonly total: string

  constructor(total: string, context?: Record<string, unknown>) {
    super(`${total} is too large to compute exactly`, 'AMOUNT_OVERFLOW', {
      total,
      ...context,
    })
    this.name = 'AmountOverflowError'
    this.total = total
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends SalesPipelineError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends SalesPipelineError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is a positive integer (> 0)
 */
export function requirePositiveInteger(
  value: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be an integer')
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is a non-negative integer (>= 0)
 */
export function requireNonNegativeInteger(
  value: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be an integer')
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Validates that a value is one of the allowed options
 */
export function requireOneOf<T>(
  value: unknown,
  allowedValues: readonly T[],
  parameterName: string
): T {
  const match = allowedValues.find((allowed) => allowed === value)
  if (match === undefined) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be one of: ${allowedValues.join(', ')}`
    )
  }
  return match
}

/**
 * Check if an error is a pipeline error
 */
export function isSalesPipelineError(error: unknown): error is SalesPipelineError {
  return error instanceof SalesPipelineError
}
