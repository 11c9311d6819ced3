/**
 * Per-match shot, corner and attack counters
 * @module sources/extended-stats
 */

import type { SideStats } from '../types/model.js'
import type { MatchStatsRecord } from '../types/records.js'
import { parseDateTime, parseOptionalCount } from './coerce.js'
import { ValidationError } from './ingestion-error.js'
import { extendedStatsRowSchema } from './row-schemas.js'
import type { ExtendedStatsRow, RawRow } from './row-schemas.js'
import { SourceAdapter } from './source-adapter.js'
import type { AdapterResolvers, SourceAdapterOptions } from './source-adapter.js'

const SIDE_COLUMNS = {
  home: { shots: 'home_shots', corners: 'home_corner', attacks: 'home_attack' },
  away: { shots: 'away_shots', corners: 'away_corner', attacks: 'away_attack' },
} as const

function sideStats(row: ExtendedStatsRow, side: 'home' | 'away'): SideStats {
  const columns = SIDE_COLUMNS[side]
  const stats: SideStats = {}
  const shots = parseOptionalCount(row[columns.shots], columns.shots)
  const corners = parseOptionalCount(row[columns.corners], columns.corners)
  const attacks = parseOptionalCount(row[columns.attacks], columns.attacks)
  if (shots !== undefined) stats.shots = shots
  if (corners !== undefined) stats.corners = corners
  if (attacks !== undefined) stats.attacks = attacks
  return stats
}

/**
 * Adapter for the extended statistics dataset. Rows carry no match id; they
 * are joined onto stored matches by kick-off and team names.
 */
export class ExtendedStatsAdapter extends SourceAdapter<MatchStatsRecord> {
  constructor(resolvers: AdapterResolvers, options: SourceAdapterOptions = {}) {
    super('extended-stats', 'correlation', resolvers, options)
  }

  protected convert(row: RawRow): MatchStatsRecord {
    const parsed = this.validate(extendedStatsRowSchema, row)
    const hasTime = parsed.time !== undefined
    const startTime = hasTime
      ? parseDateTime(`${parsed.date} ${parsed.time}`, 'time')
      : parseDateTime(parsed.date, 'date')

    const homeTeam = this.teamRef(parsed.home_team)
    const awayTeam = this.teamRef(parsed.away_team)
    if (homeTeam.name === awayTeam.name) {
      throw new ValidationError('away_team', `'${homeTeam.name}' cannot play itself`)
    }

    const home = sideStats(parsed, 'home')
    const away = sideStats(parsed, 'away')
    if (Object.keys(home).length === 0 && Object.keys(away).length === 0) {
      throw new ValidationError('home_shots', 'row carries no statistics')
    }

    return {
      kind: 'match-stats',
      sourceId: this.sourceId,
      startTime,
      hasTime,
      homeTeam,
      awayTeam,
      stats: { home, away },
    }
  }
}
