/**
 * Canonical intermediate records emitted by source adapters and consumed by
 * the merge engine.
 * @module types/records
 */

import type { CompetitionType, MatchStage, MatchStats } from './model.js'

/**
 * A resolved team reference
 */
export interface TeamRef {
  /** Canonical name */
  name: string
  /** Raw spelling as it appeared in the source */
  rawName: string
  displayName?: string
  region?: string
}

export interface CompetitionRef {
  name: string
  country?: string
  type?: CompetitionType
}

export interface StadiumRef {
  /** Canonical name */
  name: string
  city?: string
  region?: string
  capacity?: number
}

/**
 * A played match, from a league, cup or international source
 */
export interface MatchRecord {
  kind: 'match'
  sourceId: string
  /** Identity key derived by the adapter */
  key: string
  startTime: Date
  homeTeam: TeamRef
  awayTeam: TeamRef
  homeGoals: number
  awayGoals: number
  season: number
  competition: CompetitionRef
  round?: string
  stage?: MatchStage
  externalId?: string
  stadium?: StadiumRef
}

/**
 * A roster entry for one player
 */
export interface PlayerRecord {
  kind: 'player'
  sourceId: string
  externalId: number
  name: string
  nationality: string
  age?: number
  position?: string
  overall?: number
  potential?: number
  club?: TeamRef
  wage?: number
  jerseyNumber?: number
  contractYear?: number
  joinedAt?: Date
}

/**
 * Extended statistics to be joined onto an existing match
 */
export interface MatchStatsRecord {
  kind: 'match-stats'
  sourceId: string
  /** Kick-off as reported by the statistics source */
  startTime: Date
  /** Whether the source carried a time of day */
  hasTime: boolean
  homeTeam: TeamRef
  awayTeam: TeamRef
  stats: MatchStats
}

/**
 * Venue information to be joined onto an existing match
 */
export interface MatchVenueRecord {
  kind: 'match-venue'
  sourceId: string
  externalId?: string
  season?: number
  round?: string
  homeTeam?: TeamRef
  awayTeam?: TeamRef
  stadium: StadiumRef
}

export type CanonicalRecord =
  | MatchRecord
  | PlayerRecord
  | MatchStatsRecord
  | MatchVenueRecord

export type CanonicalRecordKind = CanonicalRecord['kind']

/**
 * Records that attach to existing matches instead of creating entities
 */
export type CorrelationRecord = MatchStatsRecord | MatchVenueRecord
