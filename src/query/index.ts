/**
 * Query module
 * @module query
 */

export { QueryEngine } from './query-engine.js'
export type {
  RecordLine,
  TeamStatistics,
  StatisticsScope,
  TeamMatchFilter,
  HeadToHead,
  StandingsRow,
  Venue,
  FormEntry,
  FormOptions,
  CompetitionTotals,
  CrossCompetitionTotals,
  ScoringRow,
  WinRecord,
  GoalAverage,
} from './types.js'
