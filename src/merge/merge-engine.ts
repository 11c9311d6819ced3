/**
 * Identity-keyed upsert of canonical records into the graph store
 * @module merge/merge-engine
 */

import {
  competitionKey,
  playerKey,
  relationshipKey,
  seasonKey,
  stadiumKey,
  teamKey,
} from '../core/identity-keys.js'
import { deriveResult } from '../core/match-result.js'
import { CorrelationMissError } from '../sources/ingestion-error.js'
import type { GraphStore, RelationshipId } from '../store/graph-store.js'
import type { CorrelationConfig } from '../types/config.js'
import type {
  BelongsToProperties,
  CompetitionNode,
  MatchNode,
  NodeKind,
  NodeTypes,
  PlayedProperties,
  PlayerNode,
  Relationship,
  RelationshipType,
  SideStats,
  StadiumNode,
  TeamNode,
} from '../types/model.js'
import type {
  CanonicalRecord,
  CompetitionRef,
  CorrelationRecord,
  MatchRecord,
  MatchStatsRecord,
  MatchVenueRecord,
  PlayerRecord,
  StadiumRef,
  TeamRef,
} from '../types/records.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import type { Correlation } from './correlator.js'
import { Correlator } from './correlator.js'
import { applyFillPolicy, hasChanges, NODE_FILL_POLICIES, RELATIONSHIP_FILL_POLICIES } from './fill-policy.js'
import { KeyedLock } from './keyed-lock.js'
import type {
  EntityChange,
  MergeConflict,
  MergeOutcome,
  MergeResult,
  RelationshipChange,
} from './types.js'

export interface MergeEngineOptions {
  logger?: Logger
  /** Source of creation timestamps (default: current time) */
  clock?: () => Date
  correlation?: Partial<CorrelationConfig>
  /** Lock shared with other engines writing to the same store */
  lock?: KeyedLock
}

/**
 * Lock key for one node. Kinds are namespaced so that a team and a stadium
 * with the same name do not contend.
 */
export function lockKey(kind: NodeKind, key: string): string {
  return `${kind}:${key}`
}

/**
 * Lock key shared by correlation records that may land on the same match.
 * Statistics rows use their calendar day, venue rows one key for all.
 */
export function correlationLockKey(scope: string): string {
  return `correlation:${scope}`
}

/**
 * Collects the changes made while merging one record
 */
class ChangeSet {
  readonly entities: EntityChange[] = []
  readonly relationships: RelationshipChange[] = []
  readonly conflicts: MergeConflict[] = []

  entity(kind: NodeKind, key: string, outcome: MergeOutcome): void {
    this.entities.push({ kind, key, outcome })
  }

  relationship(id: RelationshipId, outcome: RelationshipChange['outcome']): void {
    const change: RelationshipChange = { type: id.type, from: id.from, to: id.to, outcome }
    if (id.discriminator !== undefined) change.discriminator = id.discriminator
    this.relationships.push(change)
  }

  result(primaryKind: NodeKind, primaryKey: string): MergeResult {
    const primary = this.entities.find((e) => e.kind === primaryKind && e.key === primaryKey)
    let outcome: MergeOutcome = 'unchanged'
    if (primary?.outcome === 'created') {
      outcome = 'created'
    } else if (
      this.entities.some((e) => e.outcome !== 'unchanged') ||
      this.relationships.some((r) => r.outcome !== 'unchanged')
    ) {
      outcome = 'updated'
    }
    return {
      outcome,
      entities: this.entities,
      relationships: this.relationships,
      conflicts: this.conflicts,
    }
  }
}

function sideProperties(stats: SideStats): Pick<PlayedProperties, 'shots' | 'corners' | 'attacks'> {
  const properties: Pick<PlayedProperties, 'shots' | 'corners' | 'attacks'> = {}
  if (stats.shots !== undefined) properties.shots = stats.shots
  if (stats.corners !== undefined) properties.corners = stats.corners
  if (stats.attacks !== undefined) properties.attacks = stats.attacks
  return properties
}

/**
 * Merges canonical records into a GraphStore.
 *
 * Every node is located by its identity key. A missing node is created with
 * all supplied attributes; an existing one is updated field by field under
 * its fill policy. Relationship creation is idempotent, and match results on
 * PLAYED_* relationships are always derived from the stored score.
 *
 * All work for one record runs under a lock on every node key it touches,
 * so records sharing a key are merged one at a time, in call order.
 *
 * @example
 * ```typescript
 * const engine = new MergeEngine(store, { logger })
 * const result = await engine.merge(matchRecord)
 * console.log(result.outcome) // 'created'
 * ```
 */
export class MergeEngine {
  private readonly logger: Logger
  private readonly clock: () => Date
  private readonly lock: KeyedLock
  private readonly correlator: Correlator

  constructor(
    private readonly store: GraphStore,
    options: MergeEngineOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
    this.clock = options.clock ?? (() => new Date())
    this.lock = options.lock ?? new KeyedLock()
    this.correlator = new Correlator(store, options.correlation)
  }

  /**
   * Merges one record.
   *
   * @throws {CorrelationMissError} When a statistics or venue record cannot
   * be attached to exactly one stored match
   */
  async merge(record: CanonicalRecord): Promise<MergeResult> {
    switch (record.kind) {
      case 'match':
        return this.mergeMatch(record)
      case 'player':
        return this.mergePlayer(record)
      case 'match-stats':
        return this.mergeStats(record)
      case 'match-venue':
        return this.mergeVenue(record)
    }
  }

  private async mergeMatch(record: MatchRecord): Promise<MergeResult> {
    const competition = competitionKey(record.competition.name)
    const season = seasonKey(record.season, record.competition.name)
    const keys = [
      lockKey('match', record.key),
      lockKey('team', teamKey(record.homeTeam.name)),
      lockKey('team', teamKey(record.awayTeam.name)),
      lockKey('competition', competition),
      lockKey('season', season),
    ]
    if (record.stadium) keys.push(lockKey('stadium', stadiumKey(record.stadium.name)))

    return this.lock.run(keys, async () => {
      const changes = new ChangeSet()
      const now = this.clock()
      const { sourceId } = record

      await this.upsertNode('competition', competitionNode(record.competition, now), changes, sourceId)
      await this.upsertNode(
        'season',
        { key: season, createdAt: now, year: record.season, competition: record.competition.name },
        changes,
        sourceId
      )
      const home = await this.upsertNode('team', teamNode(record.homeTeam, now), changes, sourceId)
      const away = await this.upsertNode('team', teamNode(record.awayTeam, now), changes, sourceId)

      const candidate: MatchNode = {
        key: record.key,
        createdAt: now,
        startTime: record.startTime,
        homeTeam: home.key,
        awayTeam: away.key,
        homeGoals: record.homeGoals,
        awayGoals: record.awayGoals,
        season: record.season,
        competition: record.competition.name,
      }
      if (record.round !== undefined) candidate.round = record.round
      if (record.stage !== undefined) candidate.stage = record.stage
      if (record.externalId !== undefined) candidate.externalId = record.externalId

      // First-seen score, season and competition win over this record's
      const match = await this.upsertNode('match', candidate, changes, sourceId)
      await this.linkMatch(match, {}, {}, changes, sourceId, now)

      if (record.stadium) {
        await this.linkVenue(match, record.stadium, changes, sourceId, now)
      }

      return changes.result('match', record.key)
    })
  }

  private async mergePlayer(record: PlayerRecord): Promise<MergeResult> {
    const key = playerKey(record.externalId)
    const keys = [lockKey('player', key)]
    if (record.club) keys.push(lockKey('team', teamKey(record.club.name)))

    return this.lock.run(keys, async () => {
      const changes = new ChangeSet()
      const now = this.clock()
      const { sourceId } = record

      const candidate: PlayerNode = {
        key,
        createdAt: now,
        externalId: record.externalId,
        name: record.name,
        nationality: record.nationality,
      }
      if (record.age !== undefined) candidate.age = record.age
      if (record.position !== undefined) candidate.position = record.position
      if (record.overall !== undefined) candidate.overall = record.overall
      if (record.potential !== undefined) candidate.potential = record.potential
      if (record.wage !== undefined) candidate.wage = record.wage
      if (record.jerseyNumber !== undefined) candidate.jerseyNumber = record.jerseyNumber
      if (record.contractYear !== undefined) candidate.contractYear = record.contractYear
      if (record.club) candidate.club = teamKey(record.club.name)

      const player = await this.upsertNode('player', candidate, changes, sourceId)

      if (record.club) {
        const club = await this.upsertNode('team', teamNode(record.club, now), changes, sourceId)

        // Club is volatile: a new club replaces every other membership
        for (const membership of await this.store.relationshipsFrom('BELONGS_TO', player.key)) {
          if (membership.to === club.key) continue
          await this.store.deleteRelationship(membership)
          changes.relationship(membership, 'removed')
        }

        const properties: BelongsToProperties = {}
        if (record.jerseyNumber !== undefined) properties.jerseyNumber = record.jerseyNumber
        if (record.joinedAt !== undefined) properties.joinedAt = record.joinedAt
        if (record.contractYear !== undefined) properties.contractYear = record.contractYear
        if (record.wage !== undefined) properties.wage = record.wage

        await this.upsertRelationship(
          { type: 'BELONGS_TO', from: player.key, to: club.key, properties, createdAt: now },
          changes,
          sourceId
        )
      }

      return changes.result('player', key)
    })
  }

  private async mergeStats(record: MatchStatsRecord): Promise<MergeResult> {
    // Correlation runs inside the lock so rows for one match apply in call order
    const keys = [
      correlationLockKey(record.startTime.toISOString().slice(0, 10)),
      lockKey('team', teamKey(record.homeTeam.name)),
      lockKey('team', teamKey(record.awayTeam.name)),
    ]
    return this.lock.run(keys, async () => {
      const correlation = await this.correlator.correlateStats(record)
      const target = this.requireMatch(correlation, record, {
        homeTeam: record.homeTeam.name,
        awayTeam: record.awayTeam.name,
        startTime: record.startTime.toISOString(),
      })

      const changes = new ChangeSet()
      const now = this.clock()
      const { sourceId } = record

      const match = await this.upsertNode('match', { ...target, stats: record.stats }, changes, sourceId)
      const stats = match.stats ?? record.stats
      await this.linkMatch(
        match,
        sideProperties(stats.home),
        sideProperties(stats.away),
        changes,
        sourceId,
        now
      )
      return changes.result('match', match.key)
    })
  }

  private async mergeVenue(record: MatchVenueRecord): Promise<MergeResult> {
    const keys = [correlationLockKey('venue'), lockKey('stadium', stadiumKey(record.stadium.name))]
    return this.lock.run(keys, async () => {
      const correlation = await this.correlator.correlateVenue(record)
      const context: Record<string, unknown> = { stadium: record.stadium.name }
      if (record.externalId !== undefined) context.externalId = record.externalId
      if (record.season !== undefined) context.season = record.season
      if (record.round !== undefined) context.round = record.round
      const target = this.requireMatch(correlation, record, context)

      const changes = new ChangeSet()
      await this.linkVenue(target, record.stadium, changes, record.sourceId, this.clock())
      changes.entity('match', target.key, 'unchanged')
      return changes.result('match', target.key)
    })
  }

  private requireMatch(
    correlation: Correlation,
    record: CorrelationRecord,
    context: Record<string, unknown>
  ): MatchNode {
    if (correlation.status === 'matched' && correlation.match) {
      this.logger.debug('Correlated row to match', {
        sourceId: record.sourceId,
        match: correlation.match.key,
        confidence: correlation.confidence,
      })
      return correlation.match
    }
    throw new CorrelationMissError(correlation.status === 'ambiguous' ? 'ambiguous' : 'miss', {
      sourceId: record.sourceId,
      candidates: correlation.candidates.map((c) => c.match.key),
      ...context,
    })
  }

  /**
   * Creates or completes the relationships every match has: both PLAYED_*
   * edges, IN_COMPETITION, IN_SEASON and both teams' COMPETES_IN.
   */
  private async linkMatch(
    match: MatchNode,
    homeExtras: Partial<PlayedProperties>,
    awayExtras: Partial<PlayedProperties>,
    changes: ChangeSet,
    sourceId: string,
    now: Date
  ): Promise<void> {
    const home: PlayedProperties = {
      ...homeExtras,
      goalsScored: match.homeGoals,
      goalsConceded: match.awayGoals,
      result: deriveResult(match.homeGoals, match.awayGoals),
    }
    const away: PlayedProperties = {
      ...awayExtras,
      goalsScored: match.awayGoals,
      goalsConceded: match.homeGoals,
      result: deriveResult(match.awayGoals, match.homeGoals),
    }
    const competition = competitionKey(match.competition)
    const season = seasonKey(match.season, match.competition)
    const discriminator = String(match.season)

    await this.upsertRelationship(
      { type: 'PLAYED_HOME', from: match.homeTeam, to: match.key, properties: home, createdAt: now },
      changes,
      sourceId
    )
    await this.upsertRelationship(
      { type: 'PLAYED_AWAY', from: match.awayTeam, to: match.key, properties: away, createdAt: now },
      changes,
      sourceId
    )
    await this.upsertRelationship(
      { type: 'IN_COMPETITION', from: match.key, to: competition, properties: {}, createdAt: now },
      changes,
      sourceId
    )
    await this.upsertRelationship(
      { type: 'IN_SEASON', from: match.key, to: season, properties: {}, createdAt: now },
      changes,
      sourceId
    )
    for (const team of [match.homeTeam, match.awayTeam]) {
      await this.upsertRelationship(
        {
          type: 'COMPETES_IN',
          from: team,
          to: competition,
          discriminator,
          properties: { season: match.season },
          createdAt: now,
        },
        changes,
        sourceId
      )
    }
  }

  /**
   * Links a match to its stadium. A match already hosted elsewhere keeps its
   * first stadium and the new one is reported as a conflict.
   */
  private async linkVenue(
    match: MatchNode,
    ref: StadiumRef,
    changes: ChangeSet,
    sourceId: string,
    now: Date
  ): Promise<void> {
    const stadium = await this.upsertNode('stadium', stadiumNode(ref, now), changes, sourceId)

    const hosts = await this.store.relationshipsFrom('HOSTED_AT', match.key)
    const other = hosts.find((h) => h.to !== stadium.key)
    if (other) {
      this.recordConflicts(changes, [
        {
          entity: 'HOSTED_AT',
          key: match.key,
          field: 'stadium',
          existing: other.to,
          incoming: stadium.key,
          sourceId,
        },
      ])
      return
    }

    await this.upsertRelationship(
      { type: 'HOSTED_AT', from: match.key, to: stadium.key, properties: {}, createdAt: now },
      changes,
      sourceId
    )
  }

  private async upsertNode<K extends NodeKind>(
    kind: K,
    candidate: NodeTypes[K],
    changes: ChangeSet,
    sourceId: string
  ): Promise<NodeTypes[K]> {
    const existing = await this.store.getNode(kind, candidate.key)
    if (!existing) {
      const created = await this.store.createNode(kind, candidate)
      changes.entity(kind, candidate.key, 'created')
      return created
    }

    const fill = applyFillPolicy(NODE_FILL_POLICIES[kind], existing, candidate, {
      entity: kind,
      key: candidate.key,
      sourceId,
    })
    this.recordConflicts(changes, fill.conflicts)

    if (!hasChanges(fill)) {
      changes.entity(kind, candidate.key, 'unchanged')
      return existing
    }
    const updated = await this.store.updateNode(kind, candidate.key, fill.changes)
    changes.entity(kind, candidate.key, 'updated')
    return updated
  }

  private async upsertRelationship<R extends RelationshipType>(
    relationship: Relationship<R>,
    changes: ChangeSet,
    sourceId: string
  ): Promise<void> {
    const id: RelationshipId<R> = {
      type: relationship.type,
      from: relationship.from,
      to: relationship.to,
      discriminator: relationship.discriminator,
    }
    const existing = await this.store.getRelationship(id)
    if (!existing) {
      await this.store.createRelationship(relationship)
      changes.relationship(id, 'created')
      return
    }

    const fill = applyFillPolicy(
      RELATIONSHIP_FILL_POLICIES[relationship.type],
      existing.properties,
      relationship.properties,
      {
        entity: relationship.type,
        key: relationshipKey(id.type, id.from, id.to, id.discriminator),
        sourceId,
      }
    )
    this.recordConflicts(changes, fill.conflicts)

    if (!hasChanges(fill)) {
      changes.relationship(id, 'unchanged')
      return
    }
    await this.store.updateRelationship(id, fill.changes)
    changes.relationship(id, 'updated')
  }

  private recordConflicts(changes: ChangeSet, conflicts: MergeConflict[]): void {
    for (const conflict of conflicts) {
      this.logger.warn('Conflicting value rejected, keeping the stored one', {
        entity: conflict.entity,
        key: conflict.key,
        field: conflict.field,
        existing: conflict.existing,
        incoming: conflict.incoming,
        sourceId: conflict.sourceId,
      })
      changes.conflicts.push(conflict)
    }
  }
}

function teamNode(ref: TeamRef, now: Date): TeamNode {
  const node: TeamNode = {
    key: teamKey(ref.name),
    createdAt: now,
    name: ref.name,
    aliases: ref.rawName.trim() !== ref.name ? [ref.rawName.trim()] : [],
  }
  if (ref.displayName !== undefined) node.displayName = ref.displayName
  if (ref.region !== undefined) node.region = ref.region
  return node
}

function competitionNode(ref: CompetitionRef, now: Date): CompetitionNode {
  const node: CompetitionNode = { key: competitionKey(ref.name), createdAt: now, name: ref.name }
  if (ref.country !== undefined) node.country = ref.country
  if (ref.type !== undefined) node.type = ref.type
  return node
}

function stadiumNode(ref: StadiumRef, now: Date): StadiumNode {
  const node: StadiumNode = { key: stadiumKey(ref.name), createdAt: now, name: ref.name }
  if (ref.city !== undefined) node.city = ref.city
  if (ref.region !== undefined) node.region = ref.region
  if (ref.capacity !== undefined) node.capacity = ref.capacity
  return node
}
