/**
 * Record merging, correlation and deduplication
 * @module merge
 */

export type {
  MergeOutcome,
  MergeConflict,
  MergeResult,
  EntityChange,
  RelationshipChange,
} from './types.js'

export {
  applyFillPolicy,
  hasChanges,
  NODE_FILL_POLICIES,
  RELATIONSHIP_FILL_POLICIES,
} from './fill-policy.js'
export type { FillPolicy, FieldPolicy, FillResult, FillTarget } from './fill-policy.js'

export { MergeEngine, correlationLockKey, lockKey } from './merge-engine.js'
export type { MergeEngineOptions } from './merge-engine.js'

export { KeyedLock } from './keyed-lock.js'

export { Correlator, decide, namesOverlap } from './correlator.js'
export type {
  Correlation,
  CorrelationCandidate,
  CorrelationConfidence,
  CorrelationStatus,
} from './correlator.js'

export { TeamDeduplicator } from './dedup.js'
export type { DeduplicationReport, RefusedFold, TeamFold, TeamDeduplicatorOptions } from './dedup.js'
