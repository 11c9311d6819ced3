/**
 * Continental cup fixtures
 * @module sources/international-matches
 */

import { DEFAULT_COMPETITIONS } from '../types/config.js'
import type { MatchStage } from '../types/model.js'
import type { MatchRecord } from '../types/records.js'
import { MatchSourceAdapter } from './match-source-adapter.js'
import type { MatchSourceOptions } from './match-source-adapter.js'
import { internationalMatchRowSchema } from './row-schemas.js'
import type { RawRow } from './row-schemas.js'
import type { AdapterResolvers } from './source-adapter.js'

const GROUP_STAGE = /group|grupo/i

/**
 * Classifies a stage label. Anything that is not a group-stage label counts
 * as knockout.
 *
 * @example
 * ```typescript
 * classifyStage('Fase de Grupos') // 'group'
 * classifyStage('Group C')        // 'group'
 * classifyStage('Semifinal')      // 'knockout'
 * ```
 */
export function classifyStage(label: string): MatchStage {
  return GROUP_STAGE.test(label) ? 'group' : 'knockout'
}

/**
 * Adapter for the international cup dataset. The stage comes from the
 * `stage` column, or from the round label when that column is empty.
 */
export class InternationalMatchesAdapter extends MatchSourceAdapter {
  constructor(resolvers: AdapterResolvers, options: MatchSourceOptions = {}) {
    super('international-matches', resolvers, DEFAULT_COMPETITIONS.international, options)
  }

  protected convert(row: RawRow): MatchRecord {
    const parsed = this.validate(internationalMatchRowSchema, row)
    const label = parsed.stage ?? parsed.round
    return this.buildMatch(parsed, {
      round: parsed.round,
      stage: label === undefined ? undefined : classifyStage(label),
    })
  }
}
