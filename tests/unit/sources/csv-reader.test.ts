import { describe, it, expect } from 'vitest'
import { parseCsvRows, readCsvRows } from '../../../src/sources/csv-reader.js'
import { SourceReadError } from '../../../src/sources/ingestion-error.js'

describe('parseCsvRows', () => {
  it('keys cells by header and trims them', () => {
    const rows = parseCsvRows('home_team,away_team\n Santos , Bahia\n\nGrêmio,Internacional\n')

    expect(rows).toEqual([
      { home_team: 'Santos', away_team: 'Bahia' },
      { home_team: 'Grêmio', away_team: 'Internacional' },
    ])
  })

  it('strips a byte order mark', () => {
    expect(parseCsvRows('\uFEFFid,name\n1,Test Player\n')).toEqual([{ id: '1', name: 'Test Player' }])
  })

  it('keeps quoted commas', () => {
    expect(parseCsvRows('stadium,city\n"Arena, Nova",Salvador\n')).toEqual([
      { stadium: 'Arena, Nova', city: 'Salvador' },
    ])
  })

  it('wraps malformed text in a SourceReadError', () => {
    const error = (() => {
      try {
        parseCsvRows('a,b\n"unterminated,1\n', 'broken-feed')
        return undefined
      } catch (e) {
        return e
      }
    })()

    expect(error).toBeInstanceOf(SourceReadError)
    expect(error).toMatchObject({ sourceId: 'broken-feed', code: 'SOURCE_READ_ERROR' })
  })
})

describe('readCsvRows', () => {
  it('reports a missing file against the source', () => {
    expect(() => readCsvRows('/nonexistent/scoreline/league.csv', 'league-matches')).toThrow(
      /^Cannot read source 'league-matches': /
    )
  })
})
