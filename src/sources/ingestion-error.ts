/**
 * Per-row and per-source ingestion errors
 * @module sources/ingestion-error
 */

import { ScorelineError } from '../utils/errors.js'

/**
 * Base class for errors raised while turning raw rows into canonical records
 */
export class IngestionError extends ScorelineError {
  /** Zero-based index of the offending row, when known */
  public readonly rowIndex?: number

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    rowIndex?: number
  ) {
    super(message, code, rowIndex === undefined ? context : { rowIndex, ...context })
    this.name = 'IngestionError'
    this.rowIndex = rowIndex
  }
}

/**
 * A raw value cannot be coerced to the required type
 *
 * @example
 * ```typescript
 * throw new ParseError('home_goal', 'two', 'not an integer')
 * ```
 */
export class ParseError extends IngestionError {
  public readonly field: string
  public readonly value: unknown
  public readonly reason: string

  constructor(field: string, value: unknown, reason: string, rowIndex?: number) {
    super(`Cannot parse '${field}': ${reason}`, 'PARSE_ERROR', { field, value, reason }, rowIndex)
    this.name = 'ParseError'
    this.field = field
    this.value = value
    this.reason = reason
  }

  atRow(rowIndex: number): ParseError {
    return new ParseError(this.field, this.value, this.reason, rowIndex)
  }
}

/**
 * A required field is missing or a row breaks a record invariant
 */
export class ValidationError extends IngestionError {
  public readonly field: string
  public readonly reason: string

  constructor(field: string, reason: string, rowIndex?: number) {
    super(`Invalid '${field}': ${reason}`, 'VALIDATION_ERROR', { field, reason }, rowIndex)
    this.name = 'ValidationError'
    this.field = field
    this.reason = reason
  }

  atRow(rowIndex: number): ValidationError {
    return new ValidationError(this.field, this.reason, rowIndex)
  }
}

/**
 * A statistics or venue row could not be attached to exactly one match
 */
export class CorrelationMissError extends IngestionError {
  public readonly reason: 'miss' | 'ambiguous'

  constructor(reason: 'miss' | 'ambiguous', context?: Record<string, unknown>) {
    super(
      reason === 'ambiguous'
        ? 'Row matches more than one match equally well'
        : 'Row matches no stored match',
      'CORRELATION_MISS',
      { reason, ...context }
    )
    this.name = 'CorrelationMissError'
    this.reason = reason
  }
}

/**
 * A whole source cannot be read. Fails that source only.
 */
export class SourceReadError extends IngestionError {
  public readonly sourceId: string

  constructor(sourceId: string, reason: string, context?: Record<string, unknown>) {
    super(`Cannot read source '${sourceId}': ${reason}`, 'SOURCE_READ_ERROR', {
      sourceId,
      ...context,
    })
    this.name = 'SourceReadError'
    this.sourceId = sourceId
  }
}

/**
 * Row-level issues reported by adapters
 */
export type RowIssue = ParseError | ValidationError

export function isRowIssue(error: unknown): error is RowIssue {
  return error instanceof ParseError || error instanceof ValidationError
}
