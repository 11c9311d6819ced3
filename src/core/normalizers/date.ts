import { DateTime } from 'luxon'

/**
 * Start-time layouts seen across the match sources, tried in order.
 * Luxon format tokens.
 */
export const START_TIME_FORMATS: readonly string[] = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy-MM-dd',
  'dd/MM/yyyy HH:mm:ss',
  'dd/MM/yyyy HH:mm',
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'yyyy/MM/dd',
]

/**
 * Parses a source start time as a UTC wall-clock instant. Values are read in
 * the UTC zone directly, so the result never depends on the host time zone
 * or its daylight-saving gaps. A missing time of day means midnight.
 *
 * @returns The parsed instant, or null when no known layout matches
 *
 * @example
 * ```typescript
 * parseStartTime('2023-05-01 16:00:00') // 2023-05-01T16:00:00.000Z
 * parseStartTime('01/05/2023 16:00')    // 2023-05-01T16:00:00.000Z
 * parseStartTime('2023-05-01')          // 2023-05-01T00:00:00.000Z
 * parseStartTime('yesterday')           // null
 * ```
 */
export function parseStartTime(value: string): Date | null {
  const trimmed = value.trim()
  if (trimmed === '') return null

  for (const format of START_TIME_FORMATS) {
    const parsed = DateTime.fromFormat(trimmed, format, { zone: 'utc' })
    if (parsed.isValid) {
      return parsed.toJSDate()
    }
  }

  return null
}

/**
 * Whether two instants fall on the same UTC calendar day.
 */
export function isSameUtcDay(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  )
}

/**
 * Absolute distance between two instants in whole minutes.
 */
export function minutesBetween(a: Date, b: Date): number {
  return Math.round(Math.abs(a.getTime() - b.getTime()) / 60_000)
}
