import type { CompetitionRef } from './records.js'

/**
 * Configuration for the best-effort join of statistics and venue rows onto
 * existing matches.
 */
export interface CorrelationConfig {
  /**
   * Largest distance, in minutes, between a statistics row's kick-off and a
   * candidate match's start time. Candidates further away are discarded.
   */
  maxDistanceMinutes: number
}

/**
 * Competition each match source files its matches under.
 */
export interface MatchSourceCompetitions {
  league: CompetitionRef
  cup: CompetitionRef
  international: CompetitionRef
}

/**
 * Complete configuration for an ingestion pipeline.
 */
export interface PipelineConfig {
  /** Number of records merged concurrently within one source (default: 8) */
  concurrency: number
  /** Nationality kept by the player roster source (default: 'Brazil') */
  rosterNationality: string
  /** Competitions used by the league, cup and international sources */
  competitions: MatchSourceCompetitions
  /** Correlation settings for statistics and venue sources */
  correlation: CorrelationConfig
}

export const DEFAULT_COMPETITIONS: MatchSourceCompetitions = {
  league: { name: 'Brasileirão Série A', country: 'Brazil', type: 'league' },
  cup: { name: 'Copa do Brasil', country: 'Brazil', type: 'cup' },
  international: {
    name: 'Copa Libertadores',
    country: 'South America',
    type: 'international',
  },
}

export const DEFAULT_CORRELATION_CONFIG: CorrelationConfig = {
  maxDistanceMinutes: 24 * 60,
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  concurrency: 8,
  rosterNationality: 'Brazil',
  competitions: DEFAULT_COMPETITIONS,
  correlation: DEFAULT_CORRELATION_CONFIG,
}
