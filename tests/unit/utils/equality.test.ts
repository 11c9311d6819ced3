import { describe, it, expect } from 'vitest'
import { valuesEqual } from '../../../src/utils/equality.js'

describe('valuesEqual', () => {
  it('compares primitives strictly', () => {
    expect(valuesEqual(3, 3)).toBe(true)
    expect(valuesEqual(3, '3')).toBe(false)
    expect(valuesEqual(null, undefined)).toBe(false)
  })

  it('compares dates by instant', () => {
    expect(valuesEqual(new Date('2023-05-01T16:00:00Z'), new Date(Date.UTC(2023, 4, 1, 16)))).toBe(true)
    expect(valuesEqual(new Date('2023-05-01T16:00:00Z'), '2023-05-01T16:00:00.000Z')).toBe(false)
  })

  it('compares arrays element by element', () => {
    expect(valuesEqual(['Timão', 'SCCP'], ['Timão', 'SCCP'])).toBe(true)
    expect(valuesEqual(['Timão', 'SCCP'], ['SCCP', 'Timão'])).toBe(false)
  })

  it('ignores undefined object entries', () => {
    expect(valuesEqual({ shots: 10, corners: undefined }, { shots: 10 })).toBe(true)
    expect(valuesEqual({ home: { shots: 10 } }, { home: { shots: 11 } })).toBe(false)
  })
})
