/**
 * Best-effort join of statistics and venue rows onto stored matches
 * @module merge/correlator
 */

import { foldName } from '../core/normalizers/basic.js'
import { isSameUtcDay, minutesBetween } from '../core/normalizers/date.js'
import type { GraphStore } from '../store/graph-store.js'
import type { CorrelationConfig } from '../types/config.js'
import { DEFAULT_CORRELATION_CONFIG } from '../types/config.js'
import type { MatchNode } from '../types/model.js'
import type { MatchStatsRecord, MatchVenueRecord, TeamRef } from '../types/records.js'

export type CorrelationStatus = 'matched' | 'miss' | 'ambiguous'

/**
 * `exact` when both team names (or the external id) are equal, `contains`
 * when one only contains the other
 */
export type CorrelationConfidence = 'exact' | 'contains'

export interface CorrelationCandidate {
  match: MatchNode
  confidence: CorrelationConfidence
  /** Minutes between the row's time and the match start, when comparable */
  distanceMinutes?: number
}

export interface Correlation {
  status: CorrelationStatus
  /** The chosen match, when matched */
  match?: MatchNode
  confidence?: CorrelationConfidence
  /** Every candidate considered, nearest first */
  candidates: CorrelationCandidate[]
}

/**
 * Name containment in either direction, diacritic- and case-insensitive.
 */
export function namesOverlap(a: string, b: string): boolean {
  const foldedA = foldName(a)
  const foldedB = foldName(b)
  if (foldedA === '' || foldedB === '') return false
  return foldedA.includes(foldedB) || foldedB.includes(foldedA)
}

function teamsConfidence(
  match: MatchNode,
  home: TeamRef,
  away: TeamRef
): CorrelationConfidence | null {
  if (!namesOverlap(match.homeTeam, home.name) || !namesOverlap(match.awayTeam, away.name)) {
    return null
  }
  return match.homeTeam === home.name && match.awayTeam === away.name ? 'exact' : 'contains'
}

function compareCandidates(a: CorrelationCandidate, b: CorrelationCandidate): number {
  const distance = (a.distanceMinutes ?? 0) - (b.distanceMinutes ?? 0)
  return distance !== 0 ? distance : a.match.key.localeCompare(b.match.key)
}

/**
 * Picks the single nearest candidate. A shared nearest distance is reported
 * as ambiguous rather than resolved arbitrarily.
 */
export function decide(candidates: CorrelationCandidate[]): Correlation {
  const sorted = [...candidates].sort(compareCandidates)
  const [best, runnerUp] = sorted
  if (!best) {
    return { status: 'miss', candidates: sorted }
  }
  if (runnerUp && (runnerUp.distanceMinutes ?? 0) === (best.distanceMinutes ?? 0)) {
    return { status: 'ambiguous', candidates: sorted }
  }
  return { status: 'matched', match: best.match, confidence: best.confidence, candidates: sorted }
}

/**
 * Finds the stored match a correlation record refers to.
 *
 * Statistics rows match on calendar day and team-name containment, then on
 * the nearest kick-off within `maxDistanceMinutes`. Venue rows match on
 * external id, or on season, round and team names when the id is absent.
 */
export class Correlator {
  private readonly config: CorrelationConfig

  constructor(
    private readonly store: GraphStore,
    config: Partial<CorrelationConfig> = {}
  ) {
    this.config = { ...DEFAULT_CORRELATION_CONFIG, ...config }
  }

  async correlateStats(record: MatchStatsRecord): Promise<Correlation> {
    const matches = await this.store.findNodes('match')
    const candidates: CorrelationCandidate[] = []

    for (const match of matches) {
      if (!isSameUtcDay(match.startTime, record.startTime)) continue
      const confidence = teamsConfidence(match, record.homeTeam, record.awayTeam)
      if (!confidence) continue
      const distanceMinutes = minutesBetween(match.startTime, record.startTime)
      if (distanceMinutes > this.config.maxDistanceMinutes) continue
      candidates.push({ match, confidence, distanceMinutes })
    }

    return decide(candidates)
  }

  async correlateVenue(record: MatchVenueRecord): Promise<Correlation> {
    const candidates: CorrelationCandidate[] = []

    if (record.externalId !== undefined) {
      const externalId = record.externalId
      for (const match of await this.store.findNodes('match')) {
        if (match.externalId === undefined || !match.externalId.includes(externalId)) continue
        candidates.push({
          match,
          confidence: match.externalId === externalId ? 'exact' : 'contains',
        })
      }
      return decide(candidates)
    }

    const { homeTeam, awayTeam, season } = record
    if (!homeTeam || !awayTeam || season === undefined) {
      return { status: 'miss', candidates }
    }

    for (const match of await this.store.findNodes('match', { season })) {
      if (record.round !== undefined && match.round !== undefined && foldName(match.round) !== foldName(record.round)) {
        continue
      }
      const confidence = teamsConfidence(match, homeTeam, awayTeam)
      if (confidence) candidates.push({ match, confidence })
    }
    return decide(candidates)
  }
}
