/**
 * Root error classes and parameter guards
 * @module utils/errors
 */

/**
 * Base class of every error scoreline throws. `code` is stable and meant
 * for programmatic handling; `context` carries the values involved.
 */
export class ScorelineError extends Error {
  public readonly code: string
  public readonly context?: Record<string, unknown>

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'ScorelineError'
    this.code = code
    this.context = context

    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * A caller passed an argument outside its allowed range
 */
export class InvalidParameterError extends ScorelineError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(parameterName: string, value: unknown, reason: string) {
    super(`Invalid parameter '${parameterName}': ${reason}`, 'INVALID_PARAMETER', {
      parameterName,
      value,
      reason,
    })
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Pipeline or alias data that cannot be used as given
 */
export class ConfigurationError extends ScorelineError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

export function requirePositiveInteger(value: number, parameterName: string): number {
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(parameterName, value, 'must be an integer')
  }
  if (value <= 0) {
    throw new InvalidParameterError(parameterName, value, 'must be positive (> 0)')
  }
  return value
}

export function requireNonEmptyString(value: string, parameterName: string): string {
  if (value.trim() === '') {
    throw new InvalidParameterError(parameterName, value, 'must not be empty')
  }
  return value
}

/**
 * @example
 * ```typescript
 * requireOneOf('cup', COMPETITION_TYPES, 'competition.type') // 'cup'
 * requireOneOf('friendly', COMPETITION_TYPES, 'competition.type') // throws
 * ```
 */
export function requireOneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  parameterName: string
): T {
  const found = allowed.find((candidate) => candidate === value)
  if (found === undefined) {
    throw new InvalidParameterError(parameterName, value, `must be one of: ${allowed.join(', ')}`)
  }
  return found
}

export function isScorelineError(error: unknown): error is ScorelineError {
  return error instanceof ScorelineError
}

/**
 * Printable message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
