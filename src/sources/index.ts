export { SourceAdapter, regionCode } from './source-adapter.js'
export type {
  AdaptOutcome,
  AdapterResolvers,
  SourceAdapterOptions,
  SourceKind,
  SourcePhase,
} from './source-adapter.js'
export { MatchSourceAdapter } from './match-source-adapter.js'
export type { MatchSourceOptions } from './match-source-adapter.js'
export { LeagueMatchesAdapter } from './league-matches.js'
export { CupMatchesAdapter } from './cup-matches.js'
export { InternationalMatchesAdapter, classifyStage } from './international-matches.js'
export { ExtendedStatsAdapter } from './extended-stats.js'
export { HistoricalArchiveAdapter } from './historical-archive.js'
export { PlayerRosterAdapter } from './player-roster.js'
export type { PlayerRosterOptions } from './player-roster.js'
export { readCsvRows, parseCsvRows } from './csv-reader.js'
export {
  IngestionError,
  ParseError,
  ValidationError,
  CorrelationMissError,
  SourceReadError,
  isRowIssue,
} from './ingestion-error.js'
export type { RowIssue } from './ingestion-error.js'
export {
  parseInteger,
  parseOptionalInteger,
  parseCount,
  parseWage,
  parseDateTime,
  presentValue,
} from './coerce.js'
export {
  matchRowSchema,
  internationalMatchRowSchema,
  extendedStatsRowSchema,
  archiveRowSchema,
  playerRowSchema,
} from './row-schemas.js'
export type { RawRow } from './row-schemas.js'
