/**
 * Raw string to typed value coercion for source rows
 * @module sources/coerce
 */

import { parseStartTime } from '../core/normalizers/date.js'
import { ParseError } from './ingestion-error.js'

const INTEGER = /^[+-]?\d+(?:\.0+)?$/

/**
 * Returns the value unless it is absent or blank
 */
export function presentValue(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}

/**
 * Parses an integer column. Accepts a trailing `.0` as written by some
 * spreadsheet exports.
 *
 * @throws {ParseError} If the value is not an integer
 *
 * @example
 * ```typescript
 * parseInteger('3', 'home_goal')   // 3
 * parseInteger('2.0', 'season')    // 2
 * parseInteger('two', 'home_goal') // throws ParseError
 * ```
 */
export function parseInteger(value: string, field: string): number {
  const trimmed = value.trim()
  if (!INTEGER.test(trimmed)) {
    throw new ParseError(field, value, 'not an integer')
  }
  const parsed = Number.parseInt(trimmed, 10)
  if (!Number.isSafeInteger(parsed)) {
    throw new ParseError(field, value, 'out of range')
  }
  return parsed
}

/**
 * @returns undefined for an absent or blank value
 */
export function parseOptionalInteger(value: string | undefined, field: string): number | undefined {
  const present = presentValue(value)
  return present === undefined ? undefined : parseInteger(present, field)
}

/**
 * Parses a goal or counter column: an integer that cannot be negative.
 *
 * @throws {ParseError} If the value is not a non-negative integer
 */
export function parseCount(value: string, field: string): number {
  const parsed = parseInteger(value, field)
  if (parsed < 0) {
    throw new ParseError(field, value, 'must not be negative')
  }
  return parsed
}

export function parseOptionalCount(value: string | undefined, field: string): number | undefined {
  const present = presentValue(value)
  return present === undefined ? undefined : parseCount(present, field)
}

const MONEY = /^(\d+(?:\.\d+)?)\s*([KM]?)$/i

/**
 * Parses a wage such as `€12K`, `€1.5M` or `8000` into whole currency units.
 *
 * @throws {ParseError} If the value is not a recognisable amount
 *
 * @example
 * ```typescript
 * parseWage('€12K')  // 12000
 * parseWage('€1.5M') // 1500000
 * parseWage('950')   // 950
 * ```
 */
export function parseWage(value: string, field = 'wage'): number {
  const cleaned = value.replace(/[€$£,\s]/g, '')
  const match = MONEY.exec(cleaned)
  if (!match) {
    throw new ParseError(field, value, 'not a monetary amount')
  }
  const [, amount, suffix] = match
  const multiplier = suffix.toUpperCase() === 'M' ? 1_000_000 : suffix.toUpperCase() === 'K' ? 1_000 : 1
  return Math.round(Number.parseFloat(amount) * multiplier)
}

export function parseOptionalWage(value: string | undefined, field = 'wage'): number | undefined {
  const present = presentValue(value)
  return present === undefined ? undefined : parseWage(present, field)
}

/**
 * @throws {ParseError} If no known date layout matches
 */
export function parseDateTime(value: string, field: string): Date {
  const parsed = parseStartTime(value)
  if (!parsed) {
    throw new ParseError(field, value, 'unrecognised date format')
  }
  return parsed
}

export function parseOptionalDateTime(value: string | undefined, field: string): Date | undefined {
  const present = presentValue(value)
  return present === undefined ? undefined : parseDateTime(present, field)
}
