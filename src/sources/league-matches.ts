/**
 * National league fixtures
 * @module sources/league-matches
 */

import { DEFAULT_COMPETITIONS } from '../types/config.js'
import type { MatchRecord } from '../types/records.js'
import { parseInteger } from './coerce.js'
import { MatchSourceAdapter } from './match-source-adapter.js'
import type { MatchSourceOptions } from './match-source-adapter.js'
import { matchRowSchema } from './row-schemas.js'
import type { RawRow } from './row-schemas.js'
import type { AdapterResolvers } from './source-adapter.js'

/**
 * Adapter for the league dataset. Rounds are numbered and stored as their
 * decimal text ("7").
 *
 * @example
 * ```typescript
 * const adapter = new LeagueMatchesAdapter(resolvers)
 * for (const outcome of adapter.adapt(rows)) {
 *   if (outcome.status === 'record') console.log(outcome.record.key)
 * }
 * ```
 */
export class LeagueMatchesAdapter extends MatchSourceAdapter {
  constructor(resolvers: AdapterResolvers, options: MatchSourceOptions = {}) {
    super('league-matches', resolvers, DEFAULT_COMPETITIONS.league, options)
  }

  protected convert(row: RawRow): MatchRecord {
    const parsed = this.validate(matchRowSchema, row)
    const round = parsed.round === undefined ? undefined : String(parseInteger(parsed.round, 'round'))
    return this.buildMatch(parsed, { round })
  }
}
