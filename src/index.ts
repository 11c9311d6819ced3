// Main entry point
export { Scoreline, PipelineBuilder } from './builder/pipeline-builder.js'
export type {
  RowsInput,
  SourceOptions,
  MatchSourceBuilderOptions,
  PlayerRosterBuilderOptions,
  SourceContext,
  AdapterFactory,
} from './builder/pipeline-builder.js'

// Ingestion
export { IngestionPipeline, orderSources } from './ingestion/ingestion-pipeline.js'
export type { IngestionPipelineOptions } from './ingestion/ingestion-pipeline.js'
export type {
  RowLoader,
  SourceDefinition,
  SourceStatus,
  SourceIssue,
  SourceSummary,
  IngestionTotals,
  IngestionResult,
} from './ingestion/types.js'

// Queries
export * from './query/index.js'

// Alias resolution
export * from './aliases/index.js'

// Source adapters
export * from './sources/index.js'

// Merging
export * from './merge/index.js'

// Store
export * from './store/index.js'

// Types - Model, records and configuration
export * from './types/index.js'

// Identity keys and match results
export {
  teamKey,
  playerKey,
  matchKey,
  competitionKey,
  seasonKey,
  stadiumKey,
  relationshipKey,
} from './core/identity-keys.js'
export { deriveResult, pointsFor } from './core/match-result.js'

// Normalizers
export {
  uppercase,
  normalizeWhitespace,
  stripDiacritics,
  composeNormalizers,
  foldName,
  type StringNormalizer,
} from './core/normalizers/basic.js'
export {
  START_TIME_FORMATS,
  parseStartTime,
  isSameUtcDay,
  minutesBetween,
} from './core/normalizers/date.js'

// Errors
export {
  ScorelineError,
  InvalidParameterError,
  ConfigurationError,
  requirePositiveInteger,
  requireNonEmptyString,
  requireOneOf,
  isScorelineError,
  errorMessage,
} from './utils/errors.js'

// Logging
export {
  defaultLogger,
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
  type LogLevel,
} from './utils/logger.js'

// Utilities
export { valuesEqual } from './utils/equality.js'
