import { describe, it, expect } from 'vitest'
import {
  parseCount,
  parseDateTime,
  parseInteger,
  parseOptionalInteger,
  parseOptionalWage,
  parseWage,
  presentValue,
} from '../../../src/sources/coerce.js'
import { ParseError } from '../../../src/sources/ingestion-error.js'

describe('presentValue', () => {
  it('drops blank values', () => {
    expect(presentValue(undefined)).toBeUndefined()
    expect(presentValue('   ')).toBeUndefined()
    expect(presentValue(' 7 ')).toBe(' 7 ')
  })
})

describe('parseInteger', () => {
  it('parses integers and spreadsheet floats', () => {
    expect(parseInteger('3', 'home_goal')).toBe(3)
    expect(parseInteger(' 2023 ', 'season')).toBe(2023)
    expect(parseInteger('2.0', 'round')).toBe(2)
    expect(parseInteger('-1', 'x')).toBe(-1)
  })

  it('rejects anything else with a ParseError naming the field', () => {
    expect(() => parseInteger('two', 'home_goal')).toThrow(ParseError)
    expect(() => parseInteger('2.5', 'home_goal')).toThrow(
      "Cannot parse 'home_goal': not an integer"
    )
  })

  it('treats blank optional values as absent', () => {
    expect(parseOptionalInteger('', 'age')).toBeUndefined()
    expect(parseOptionalInteger('31', 'age')).toBe(31)
  })
})

describe('parseCount', () => {
  it('rejects negative counts', () => {
    expect(parseCount('0', 'away_goal')).toBe(0)
    expect(() => parseCount('-2', 'away_goal')).toThrow(ParseError)
  })
})

describe('parseWage', () => {
  it('expands K and M suffixes and drops currency symbols', () => {
    expect(parseWage('€12K')).toBe(12000)
    expect(parseWage('€1.5M')).toBe(1500000)
    expect(parseWage('950')).toBe(950)
    expect(parseWage('$ 2,500')).toBe(2500)
  })

  it('rejects malformed amounts', () => {
    expect(() => parseWage('lots')).toThrow(ParseError)
    expect(parseOptionalWage(undefined)).toBeUndefined()
  })
})

describe('parseDateTime', () => {
  it('parses start times or throws', () => {
    expect(parseDateTime('2023-05-01 16:00:00', 'datetime').toISOString()).toBe(
      '2023-05-01T16:00:00.000Z'
    )
    expect(() => parseDateTime('soon', 'datetime')).toThrow(ParseError)
  })
})
