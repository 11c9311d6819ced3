/**
 * National cup fixtures
 * @module sources/cup-matches
 */

import { DEFAULT_COMPETITIONS } from '../types/config.js'
import type { MatchRecord } from '../types/records.js'
import { MatchSourceAdapter } from './match-source-adapter.js'
import type { MatchSourceOptions } from './match-source-adapter.js'
import { matchRowSchema } from './row-schemas.js'
import type { RawRow } from './row-schemas.js'
import type { AdapterResolvers } from './source-adapter.js'

/**
 * Adapter for the cup dataset. Rounds are free text ("Quartas de final").
 */
export class CupMatchesAdapter extends MatchSourceAdapter {
  constructor(resolvers: AdapterResolvers, options: MatchSourceOptions = {}) {
    super('cup-matches', resolvers, DEFAULT_COMPETITIONS.cup, options)
  }

  protected convert(row: RawRow): MatchRecord {
    const parsed = this.validate(matchRowSchema, row)
    return this.buildMatch(parsed, { round: parsed.round })
  }
}
