/**
 * Merge result and conflict types
 * @module merge/types
 */

import type { NodeKind, RelationshipType } from '../types/model.js'

/**
 * How one stored entity or relationship was affected
 */
export type MergeOutcome = 'created' | 'updated' | 'unchanged'

/**
 * An immutable field whose incoming value disagrees with the stored one.
 * The stored value is kept.
 */
export interface MergeConflict {
  /** Node kind or relationship type */
  entity: NodeKind | RelationshipType
  /** Identity key of the node or relationship */
  key: string
  field: string
  existing: unknown
  incoming: unknown
  /** Source that supplied the rejected value */
  sourceId?: string
}

export interface EntityChange {
  kind: NodeKind
  key: string
  outcome: MergeOutcome
}

export interface RelationshipChange {
  type: RelationshipType
  from: string
  to: string
  discriminator?: string
  /** `removed` when a volatile link was replaced (a player's old club) */
  outcome: MergeOutcome | 'removed'
}

/**
 * Result of merging one canonical record
 */
export interface MergeResult {
  /**
   * `created` if the record's primary entity was created, `updated` if
   * anything else changed, otherwise `unchanged`
   */
  outcome: MergeOutcome
  entities: EntityChange[]
  relationships: RelationshipChange[]
  conflicts: MergeConflict[]
}
