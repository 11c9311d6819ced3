/**
 * Query result shapes
 * @module query/types
 */

import type { MatchResult } from '../types/model.js'

export interface RecordLine {
  played: number
  wins: number
  draws: number
  losses: number
  goalsFor: number
  goalsAgainst: number
  goalDifference: number
  /** Three per win, one per draw */
  points: number
  /** Matches without a goal conceded */
  cleanSheets: number
}

export interface TeamStatistics extends RecordLine {
  /** Canonical team name */
  team: string
  /** Share of matches won, 0-100, two decimals; 0 without matches */
  winPercentage: number
  /** Goals scored per match, two decimals */
  averageGoalsScored: number
  /** Goals conceded per match, two decimals */
  averageGoalsConceded: number
}

export interface StatisticsScope {
  season?: number
  competition?: string
}

export interface TeamMatchFilter extends StatisticsScope {
  /** Only home or only away matches */
  venue?: Venue
}

export interface HeadToHead {
  teamA: string
  teamB: string
  matches: number
  teamAWins: number
  teamBWins: number
  draws: number
  teamAGoals: number
  teamBGoals: number
}

export interface StandingsRow extends RecordLine {
  /** 1-based */
  position: number
  team: string
}

export type Venue = 'home' | 'away'

export interface FormEntry {
  match: string
  startTime: Date
  competition: string
  season: number
  opponent: string
  venue: Venue
  goalsFor: number
  goalsAgainst: number
  result: MatchResult
}

export interface FormOptions {
  competition?: string
  /** Number of matches (default: 5) */
  limit?: number
}

export interface CompetitionTotals {
  competition: string
  matches: number
  wins: number
  draws: number
  losses: number
  goalsFor: number
  goalsAgainst: number
}

export interface CrossCompetitionTotals {
  team: string
  matches: number
  wins: number
  draws: number
  losses: number
  goalsFor: number
  goalsAgainst: number
  /** Sorted by competition name */
  competitions: CompetitionTotals[]
}

export interface ScoringRow {
  team: string
  goalsFor: number
  matches: number
}

export interface WinRecord {
  match: string
  startTime: Date
  competition: string
  season: number
  winner: string
  loser: string
  winnerGoals: number
  loserGoals: number
  margin: number
}

export interface GoalAverage {
  matches: number
  goals: number
  /** Goals per match; 0 without matches */
  average: number
}
