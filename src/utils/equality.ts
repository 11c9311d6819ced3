/**
 * Structural equality for stored attribute values
 * @module utils/equality
 */

/**
 * Compares two values structurally. Dates compare by instant, arrays by
 * element, plain objects by own enumerable keys.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || b === null) return false
  if (a === undefined || b === undefined) return false
  if (typeof a !== typeof b) return false

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }

  // Arrays
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false
    if (a.length !== b.length) return false
    return a.every((value: unknown, index) => valuesEqual(value, b[index]))
  }

  // Objects
  if (typeof a === 'object' && typeof b === 'object') {
    const aEntries = Object.entries(a).filter(([, value]) => value !== undefined)
    const bValues = new Map<string, unknown>(
      Object.entries(b).filter(([, value]) => value !== undefined)
    )
    if (aEntries.length !== bValues.size) return false
    return aEntries.every(
      ([key, value]: [string, unknown]) => bValues.has(key) && valuesEqual(value, bValues.get(key))
    )
  }

  return false
}
