/**
 * Archive of past fixtures with venue details
 * @module sources/historical-archive
 */

import type { MatchVenueRecord } from '../types/records.js'
import { parseOptionalCount, parseOptionalInteger } from './coerce.js'
import { ValidationError } from './ingestion-error.js'
import { archiveRowSchema } from './row-schemas.js'
import type { RawRow } from './row-schemas.js'
import { regionCode, SourceAdapter } from './source-adapter.js'
import type { AdapterResolvers, SourceAdapterOptions } from './source-adapter.js'

/**
 * Adapter for the historical archive. Each row names the stadium a match was
 * played at; the match is found by external id, or by season, round and
 * teams when the id is absent.
 */
export class HistoricalArchiveAdapter extends SourceAdapter<MatchVenueRecord> {
  constructor(resolvers: AdapterResolvers, options: SourceAdapterOptions = {}) {
    super('historical-archive', 'correlation', resolvers, options)
  }

  protected convert(row: RawRow): MatchVenueRecord {
    const parsed = this.validate(archiveRowSchema, row)
    const season = parseOptionalInteger(parsed.season, 'season')

    if (parsed.match_id === undefined) {
      if (season === undefined) throw new ValidationError('season', 'required without match_id')
      if (parsed.home_team === undefined) throw new ValidationError('home_team', 'required without match_id')
      if (parsed.away_team === undefined) throw new ValidationError('away_team', 'required without match_id')
    }

    const record: MatchVenueRecord = {
      kind: 'match-venue',
      sourceId: this.sourceId,
      stadium: this.stadiumRef(parsed.stadium, {
        city: parsed.city,
        region: regionCode(parsed.state),
        capacity: parseOptionalCount(parsed.capacity, 'capacity'),
      }),
    }
    if (parsed.match_id !== undefined) record.externalId = parsed.match_id
    if (season !== undefined) record.season = season
    if (parsed.round !== undefined) record.round = parsed.round
    if (parsed.home_team !== undefined) record.homeTeam = this.teamRef(parsed.home_team)
    if (parsed.away_team !== undefined) record.awayTeam = this.teamRef(parsed.away_team)
    return record
  }
}
