/**
 * Player ratings roster
 * @module sources/player-roster
 */

import { foldName } from '../core/normalizers/basic.js'
import type { PlayerRecord } from '../types/records.js'
import { requireNonEmptyString } from '../utils/errors.js'
import { parseInteger, parseOptionalDateTime, parseOptionalInteger, parseOptionalWage } from './coerce.js'
import { playerRowSchema } from './row-schemas.js'
import type { RawRow } from './row-schemas.js'
import { SourceAdapter } from './source-adapter.js'
import type { AdapterResolvers, SourceAdapterOptions } from './source-adapter.js'

export interface PlayerRosterOptions extends SourceAdapterOptions {
  /** Only players of this nationality are kept (default: 'Brazil') */
  nationality?: string
}

/**
 * Adapter for the player roster. Rows of other nationalities come out as
 * `filtered`, not as issues.
 */
export class PlayerRosterAdapter extends SourceAdapter<PlayerRecord> {
  readonly nationality: string
  private readonly foldedNationality: string

  constructor(resolvers: AdapterResolvers, options: PlayerRosterOptions = {}) {
    super('player-roster', 'entity', resolvers, options)
    this.nationality = requireNonEmptyString(options.nationality ?? 'Brazil', 'nationality')
    this.foldedNationality = foldName(this.nationality)
  }

  protected convert(row: RawRow): PlayerRecord | null {
    const parsed = this.validate(playerRowSchema, row)
    if (foldName(parsed.nationality) !== this.foldedNationality) {
      return null
    }

    const record: PlayerRecord = {
      kind: 'player',
      sourceId: this.sourceId,
      externalId: parseInteger(parsed.id, 'id'),
      name: parsed.name,
      nationality: parsed.nationality,
    }

    const optional = {
      age: parseOptionalInteger(parsed.age, 'age'),
      overall: parseOptionalInteger(parsed.overall, 'overall'),
      potential: parseOptionalInteger(parsed.potential, 'potential'),
      wage: parseOptionalWage(parsed.wage, 'wage'),
      jerseyNumber: parseOptionalInteger(parsed.jersey_number, 'jersey_number'),
      contractYear: parseOptionalInteger(parsed.contract_year, 'contract_year'),
      joinedAt: parseOptionalDateTime(parsed.joined, 'joined'),
    }
    if (optional.age !== undefined) record.age = optional.age
    if (optional.overall !== undefined) record.overall = optional.overall
    if (optional.potential !== undefined) record.potential = optional.potential
    if (optional.wage !== undefined) record.wage = optional.wage
    if (optional.jerseyNumber !== undefined) record.jerseyNumber = optional.jerseyNumber
    if (optional.contractYear !== undefined) record.contractYear = optional.contractYear
    if (optional.joinedAt !== undefined) record.joinedAt = optional.joinedAt
    if (parsed.position !== undefined) record.position = parsed.position
    if (parsed.club !== undefined) record.club = this.teamRef(parsed.club)
    return record
  }
}
