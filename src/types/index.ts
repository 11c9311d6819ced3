export type {
  MatchResult,
  CompetitionType,
  MatchStage,
  SideStats,
  MatchStats,
  BaseNode,
  TeamNode,
  PlayerNode,
  MatchNode,
  CompetitionNode,
  SeasonNode,
  StadiumNode,
  NodeTypes,
  NodeKind,
  NodeAttributes,
  PlayedProperties,
  BelongsToProperties,
  CompetesInProperties,
  RelationshipTypes,
  RelationshipType,
  Relationship,
} from './model.js'
export {
  COMPETITION_TYPES,
  NODE_KINDS,
  RELATIONSHIP_TYPES,
  RELATIONSHIP_ENDPOINTS,
} from './model.js'

export type {
  TeamRef,
  CompetitionRef,
  StadiumRef,
  MatchRecord,
  PlayerRecord,
  MatchStatsRecord,
  MatchVenueRecord,
  CanonicalRecord,
  CanonicalRecordKind,
  CorrelationRecord,
} from './records.js'

export type {
  PipelineConfig,
  CorrelationConfig,
  MatchSourceCompetitions,
} from './config.js'
export {
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_CORRELATION_CONFIG,
  DEFAULT_COMPETITIONS,
} from './config.js'
