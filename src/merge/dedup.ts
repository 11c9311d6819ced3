/**
 * Folding of team nodes later found to be aliases of one another
 * @module merge/dedup
 */

import type { AliasResolver } from '../aliases/alias-resolver.js'
import { matchKey, teamKey } from '../core/identity-keys.js'
import type { GraphStore } from '../store/graph-store.js'
import { NodeNotFoundError } from '../store/store-error.js'
import type { MatchNode, TeamNode } from '../types/model.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import { applyFillPolicy, hasChanges, NODE_FILL_POLICIES } from './fill-policy.js'
import type { MergeConflict } from './types.js'

export interface TeamFold {
  from: string
  to: string
}

export interface RefusedFold extends TeamFold {
  /** Matches played between the two teams */
  matches: string[]
}

export interface DeduplicationReport {
  /** Teams folded into another team */
  folded: TeamFold[]
  /** Folds not made because the two teams have played each other */
  refused: RefusedFold[]
  /** Matches whose composite key changed */
  rekeyedMatches: Array<{ from: string; to: string }>
  /** Attribute disagreements found while folding; stored values kept */
  conflicts: MergeConflict[]
}

function emptyReport(): DeduplicationReport {
  return { folded: [], refused: [], rekeyedMatches: [], conflicts: [] }
}

export interface TeamDeduplicatorOptions {
  logger?: Logger
}

/**
 * Merges team nodes that denote the same club. Run after ingestion, not
 * concurrently with it.
 */
export class TeamDeduplicator {
  private readonly logger: Logger

  constructor(
    private readonly store: GraphStore,
    private readonly resolver: AliasResolver,
    options: TeamDeduplicatorOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Re-resolves every stored team name and folds each team whose name now
   * resolves to a different canonical name.
   */
  async deduplicateTeams(): Promise<DeduplicationReport> {
    const report = emptyReport()
    const teams = await this.store.findNodes('team')

    for (const team of teams) {
      const canonical = teamKey(this.resolver.canonical(team.name))
      if (canonical === team.key) continue
      // An earlier fold may already have removed this team
      if (!(await this.store.getNode('team', team.key))) continue

      const folded = await this.mergeTeams(team.key, canonical)
      report.folded.push(...folded.folded)
      report.refused.push(...folded.refused)
      report.rekeyedMatches.push(...folded.rekeyedMatches)
      report.conflicts.push(...folded.conflicts)
    }

    this.logger.info('Team deduplication finished', {
      folded: report.folded.length,
      refused: report.refused.length,
      rekeyedMatches: report.rekeyedMatches.length,
    })
    return report
  }

  /**
   * Folds team `fromKey` into team `toKey`, creating the target when it does
   * not exist yet. Relationships move to the target, matches are re-keyed,
   * player club references are rewritten, then `fromKey` is deleted.
   *
   * Two teams that have played each other are not folded: the fold is
   * reported under `refused` and the store is left untouched.
   *
   * @throws {NodeNotFoundError} If `fromKey` does not exist
   */
  async mergeTeams(fromKey: string, toKey: string): Promise<DeduplicationReport> {
    const report = emptyReport()
    if (fromKey === toKey) return report

    const source = await this.store.getNode('team', fromKey)
    if (!source) throw new NodeNotFoundError('team', fromKey)

    const matches = await this.matchesOf(fromKey)
    const between = matches.filter((match) => match.homeTeam === toKey || match.awayTeam === toKey)
    if (between.length > 0) {
      const refused = { from: fromKey, to: toKey, matches: between.map((match) => match.key) }
      this.logger.warn('Teams have played each other, fold refused', { ...refused })
      report.refused.push(refused)
      return report
    }

    const target = await this.ensureTarget(source, toKey)
    const fill = applyFillPolicy(
      NODE_FILL_POLICIES.team,
      target,
      { ...source, key: target.key, name: target.name, aliases: [...source.aliases, source.name] },
      { entity: 'team', key: target.key }
    )
    report.conflicts.push(...fill.conflicts)
    if (hasChanges(fill)) {
      await this.store.updateNode('team', target.key, fill.changes)
    }

    for (const match of matches) {
      const rekeyed = await this.rekeyMatch(match, fromKey, toKey, report)
      report.rekeyedMatches.push({ from: match.key, to: rekeyed })
    }

    for (const player of await this.store.findNodes('player', { club: fromKey })) {
      await this.store.updateNode('player', player.key, { club: toKey })
    }

    await this.store.redirectNode('team', fromKey, toKey)
    report.folded.push({ from: fromKey, to: toKey })

    this.logger.info('Folded team', { from: fromKey, to: toKey })
    return report
  }

  private async ensureTarget(source: TeamNode, toKey: string): Promise<TeamNode> {
    const existing = await this.store.getNode('team', toKey)
    if (existing) return existing
    return this.store.createNode('team', {
      key: toKey,
      createdAt: source.createdAt,
      name: toKey,
      aliases: [],
    })
  }

  private async matchesOf(team: string): Promise<MatchNode[]> {
    const home = await this.store.findNodes('match', { homeTeam: team })
    const away = await this.store.findNodes('match', { awayTeam: team })
    return [...home, ...away]
  }

  /**
   * @returns The new match key
   */
  private async rekeyMatch(
    match: MatchNode,
    fromKey: string,
    toKey: string,
    report: DeduplicationReport
  ): Promise<string> {
    const homeTeam = match.homeTeam === fromKey ? toKey : match.homeTeam
    const awayTeam = match.awayTeam === fromKey ? toKey : match.awayTeam

    const key = matchKey(match.startTime, homeTeam, awayTeam)
    const existing = await this.store.getNode('match', key)
    if (existing) {
      const fill = applyFillPolicy(NODE_FILL_POLICIES.match, existing, match, {
        entity: 'match',
        key,
      })
      report.conflicts.push(...fill.conflicts)
      if (hasChanges(fill)) {
        await this.store.updateNode('match', key, fill.changes)
      }
    } else {
      await this.store.createNode('match', { ...match, key, homeTeam, awayTeam })
    }

    await this.store.redirectNode('match', match.key, key)
    return key
  }
}
