/**
 * Shared conversion for the league, cup and international match datasets
 * @module sources/match-source-adapter
 */

import { matchKey } from '../core/identity-keys.js'
import type { MatchStage } from '../types/model.js'
import type { CompetitionRef, MatchRecord } from '../types/records.js'
import { parseCount, parseDateTime, parseInteger } from './coerce.js'
import { ValidationError } from './ingestion-error.js'
import type { MatchRow } from './row-schemas.js'
import { SourceAdapter } from './source-adapter.js'
import type { AdapterResolvers, SourceAdapterOptions, SourceKind } from './source-adapter.js'

export interface MatchSourceOptions extends SourceAdapterOptions {
  /** Competition every match of this source is filed under */
  competition?: CompetitionRef
}

/**
 * Base for adapters whose rows are complete, played matches
 */
export abstract class MatchSourceAdapter extends SourceAdapter<MatchRecord> {
  readonly competition: CompetitionRef

  protected constructor(
    kind: SourceKind,
    resolvers: AdapterResolvers,
    defaultCompetition: CompetitionRef,
    options: MatchSourceOptions = {}
  ) {
    super(kind, 'entity', resolvers, options)
    this.competition = options.competition ?? defaultCompetition
  }

  protected buildMatch(
    row: MatchRow,
    details: { round?: string; stage?: MatchStage } = {}
  ): MatchRecord {
    const startTime = parseDateTime(row.datetime, 'datetime')
    const homeTeam = this.teamRef(row.home_team, row.home_team_state)
    const awayTeam = this.teamRef(row.away_team, row.away_team_state)
    if (homeTeam.name === awayTeam.name) {
      throw new ValidationError('away_team', `'${homeTeam.name}' cannot play itself`)
    }

    const record: MatchRecord = {
      kind: 'match',
      sourceId: this.sourceId,
      key: matchKey(startTime, homeTeam.name, awayTeam.name),
      startTime,
      homeTeam,
      awayTeam,
      homeGoals: parseCount(row.home_goal, 'home_goal'),
      awayGoals: parseCount(row.away_goal, 'away_goal'),
      season: parseInteger(row.season, 'season'),
      competition: { ...this.competition },
    }

    if (details.round !== undefined) record.round = details.round
    if (details.stage !== undefined) record.stage = details.stage
    if (row.match_id !== undefined) record.externalId = row.match_id
    if (row.arena !== undefined) {
      record.stadium = this.stadiumRef(row.arena)
    }
    return record
  }
}
