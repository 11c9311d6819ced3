/**
 * Base class for the dataset adapters
 * @module sources/source-adapter
 */

import type { z } from 'zod'
import type { AliasResolver } from '../aliases/alias-resolver.js'
import { REGION_CODES } from '../aliases/alias-table.js'
import type { CanonicalRecord, StadiumRef, TeamRef } from '../types/records.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import { isRowIssue, ValidationError } from './ingestion-error.js'
import type { RowIssue } from './ingestion-error.js'
import type { RawRow } from './row-schemas.js'

/**
 * The six supported datasets
 */
export type SourceKind =
  | 'league-matches'
  | 'cup-matches'
  | 'international-matches'
  | 'extended-stats'
  | 'historical-archive'
  | 'player-roster'

/**
 * Entity sources create teams, matches and players. Correlation sources only
 * attach data to matches that already exist, so they always run later.
 */
export type SourcePhase = 'entity' | 'correlation'

/**
 * Result of adapting one raw row
 */
export type AdaptOutcome<T extends CanonicalRecord> =
  | { status: 'record'; rowIndex: number; record: T }
  | { status: 'issue'; rowIndex: number; issue: RowIssue }
  | { status: 'filtered'; rowIndex: number }

/**
 * Name resolvers shared by every adapter of one ingestion run
 */
export interface AdapterResolvers {
  teams: AliasResolver
  stadiums: AliasResolver
}

export interface SourceAdapterOptions {
  /** Identifier used in summaries and logs (default: the source kind) */
  sourceId?: string
  /** Lower runs first within a phase (default: 0) */
  priority?: number
  logger?: Logger
}

/**
 * Converts rows of one raw dataset into canonical records.
 *
 * `adapt` is lazy and restartable: each iteration re-reads the rows from the
 * start. A row that fails validation or coercion becomes an `issue` outcome;
 * it never stops the iteration.
 *
 * @typeParam T - Canonical record type produced by this adapter
 */
export abstract class SourceAdapter<T extends CanonicalRecord = CanonicalRecord> {
  readonly sourceId: string
  readonly priority: number
  protected readonly logger: Logger

  protected constructor(
    readonly kind: SourceKind,
    readonly phase: SourcePhase,
    protected readonly resolvers: AdapterResolvers,
    options: SourceAdapterOptions = {}
  ) {
    this.sourceId = options.sourceId ?? kind
    this.priority = options.priority ?? 0
    this.logger = options.logger ?? createSilentLogger()
  }

  adapt(rows: Iterable<RawRow>): Iterable<AdaptOutcome<T>> {
    return {
      [Symbol.iterator]: () => this.iterate(rows),
    }
  }

  /**
   * Adapts a single row, turning row-level errors into an `issue` outcome.
   */
  adaptRow(row: RawRow, rowIndex: number): AdaptOutcome<T> {
    try {
      const record = this.convert(row)
      if (record === null) {
        return { status: 'filtered', rowIndex }
      }
      return { status: 'record', rowIndex, record }
    } catch (error) {
      if (!isRowIssue(error)) throw error

      const issue = error.atRow(rowIndex)
      this.logger.debug('Skipping row', {
        sourceId: this.sourceId,
        rowIndex,
        code: issue.code,
        field: issue.field,
        reason: issue.reason,
      })
      return { status: 'issue', rowIndex, issue }
    }
  }

  /**
   * Converts one row. Returns null for rows the source deliberately leaves
   * out.
   *
   * @throws {ParseError} When a value cannot be coerced
   * @throws {ValidationError} When a required field is missing
   */
  protected abstract convert(row: RawRow): T | null

  /**
   * Checks a row against its header contract.
   *
   * @throws {ValidationError} Naming the first offending field
   */
  protected validate<O>(schema: z.ZodType<O, z.ZodTypeDef, unknown>, row: RawRow): O {
    const result = schema.safeParse(row)
    if (result.success) return result.data

    const [first] = result.error.issues
    const field = first && first.path.length > 0 ? first.path.join('.') : 'row'
    throw new ValidationError(field, first?.message ?? 'does not match the expected columns')
  }

  protected teamRef(raw: string, state?: string): TeamRef {
    const resolution = this.resolvers.teams.resolve(raw)
    const ref: TeamRef = {
      name: resolution.canonicalName,
      rawName: raw,
      displayName: resolution.displayName,
    }
    const region = resolution.region ?? regionCode(state)
    if (region) ref.region = region
    return ref
  }

  protected stadiumRef(raw: string, details: Omit<StadiumRef, 'name'> = {}): StadiumRef {
    const resolution = this.resolvers.stadiums.resolve(raw)
    const ref: StadiumRef = { name: resolution.canonicalName }
    const region = resolution.region ?? details.region
    if (details.city) ref.city = details.city
    if (region) ref.region = region
    if (details.capacity !== undefined) ref.capacity = details.capacity
    return ref
  }

  private *iterate(rows: Iterable<RawRow>): Generator<AdaptOutcome<T>> {
    let rowIndex = 0
    for (const row of rows) {
      yield this.adaptRow(row, rowIndex)
      rowIndex++
    }
  }
}

/**
 * Upper-cased region code when the value is a known one
 */
export function regionCode(value: string | undefined): string | undefined {
  if (value === undefined) return undefined
  const code = value.trim().toUpperCase()
  return REGION_CODES.has(code) ? code : undefined
}
