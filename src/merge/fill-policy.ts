/**
 * Field-level fill policies applied when a record meets a stored entity
 * @module merge/fill-policy
 */

import type { NodeKind, NodeTypes, RelationshipType, RelationshipTypes } from '../types/model.js'
import { valuesEqual } from '../utils/equality.js'
import type { MergeConflict } from './types.js'

/**
 * What happens to a stored field when a later record supplies a value.
 *
 * - `identity` - Part of the identity key; never changes
 * - `immutable` - Set once; a different later value is a conflict
 * - `fillIfUnset` - Set only while the stored field is empty
 * - `overwrite` - The latest import wins
 * - `union` - Array fields gain the incoming elements they lack
 */
export type FillPolicy = 'identity' | 'immutable' | 'fillIfUnset' | 'overwrite' | 'union'

/**
 * Policy for one field of T
 */
export interface FieldPolicy<T> {
  field: keyof T & string
  policy: FillPolicy
}

export const NODE_FILL_POLICIES: { [K in NodeKind]: readonly FieldPolicy<NodeTypes[K]>[] } = {
  team: [
    { field: 'name', policy: 'identity' },
    { field: 'displayName', policy: 'fillIfUnset' },
    { field: 'region', policy: 'fillIfUnset' },
    { field: 'aliases', policy: 'union' },
  ],
  player: [
    { field: 'externalId', policy: 'identity' },
    { field: 'name', policy: 'fillIfUnset' },
    { field: 'nationality', policy: 'immutable' },
    { field: 'age', policy: 'overwrite' },
    { field: 'position', policy: 'overwrite' },
    { field: 'overall', policy: 'overwrite' },
    { field: 'potential', policy: 'overwrite' },
    { field: 'club', policy: 'overwrite' },
    { field: 'wage', policy: 'overwrite' },
    { field: 'jerseyNumber', policy: 'overwrite' },
    { field: 'contractYear', policy: 'overwrite' },
  ],
  match: [
    { field: 'startTime', policy: 'identity' },
    { field: 'homeTeam', policy: 'identity' },
    { field: 'awayTeam', policy: 'identity' },
    { field: 'homeGoals', policy: 'immutable' },
    { field: 'awayGoals', policy: 'immutable' },
    { field: 'season', policy: 'immutable' },
    { field: 'competition', policy: 'immutable' },
    { field: 'round', policy: 'fillIfUnset' },
    { field: 'stage', policy: 'fillIfUnset' },
    { field: 'externalId', policy: 'fillIfUnset' },
    { field: 'stats', policy: 'fillIfUnset' },
  ],
  competition: [
    { field: 'name', policy: 'identity' },
    { field: 'country', policy: 'immutable' },
    { field: 'type', policy: 'immutable' },
  ],
  season: [
    { field: 'year', policy: 'identity' },
    { field: 'competition', policy: 'identity' },
  ],
  stadium: [
    { field: 'name', policy: 'identity' },
    { field: 'city', policy: 'fillIfUnset' },
    { field: 'region', policy: 'fillIfUnset' },
    { field: 'capacity', policy: 'fillIfUnset' },
  ],
}

export const RELATIONSHIP_FILL_POLICIES: {
  [R in RelationshipType]: readonly FieldPolicy<RelationshipTypes[R]['properties']>[]
} = {
  PLAYED_HOME: [
    { field: 'goalsScored', policy: 'immutable' },
    { field: 'goalsConceded', policy: 'immutable' },
    { field: 'result', policy: 'immutable' },
    { field: 'shots', policy: 'fillIfUnset' },
    { field: 'corners', policy: 'fillIfUnset' },
    { field: 'attacks', policy: 'fillIfUnset' },
  ],
  PLAYED_AWAY: [
    { field: 'goalsScored', policy: 'immutable' },
    { field: 'goalsConceded', policy: 'immutable' },
    { field: 'result', policy: 'immutable' },
    { field: 'shots', policy: 'fillIfUnset' },
    { field: 'corners', policy: 'fillIfUnset' },
    { field: 'attacks', policy: 'fillIfUnset' },
  ],
  BELONGS_TO: [
    { field: 'jerseyNumber', policy: 'overwrite' },
    { field: 'joinedAt', policy: 'overwrite' },
    { field: 'contractYear', policy: 'overwrite' },
    { field: 'wage', policy: 'overwrite' },
  ],
  HOSTED_AT: [],
  IN_COMPETITION: [],
  IN_SEASON: [],
  COMPETES_IN: [{ field: 'season', policy: 'identity' }],
}

/**
 * Changes to apply plus the conflicts found
 */
export interface FillResult<T> {
  changes: Partial<T>
  conflicts: MergeConflict[]
}

/**
 * Where a fill is happening, for conflict reports
 */
export interface FillTarget {
  entity: MergeConflict['entity']
  key: string
  sourceId?: string
}

function isUnset(value: unknown): boolean {
  return value === undefined || value === null
}

/**
 * Computes the field changes an incoming value set causes on a stored one.
 * Incoming fields that are undefined are treated as not supplied. Fields
 * without a policy are left alone.
 *
 * @example
 * ```typescript
 * const { changes, conflicts } = applyFillPolicy(
 *   NODE_FILL_POLICIES.competition,
 *   { key: 'Copa do Brasil', createdAt, name: 'Copa do Brasil', type: 'cup' },
 *   { key: 'Copa do Brasil', createdAt, name: 'Copa do Brasil', type: 'league', country: 'Brazil' },
 *   { entity: 'competition', key: 'Copa do Brasil' }
 * )
 * // changes: { country: 'Brazil' }
 * // conflicts: [{ field: 'type', existing: 'cup', incoming: 'league', ... }]
 * ```
 */
export function applyFillPolicy<T extends object>(
  policies: readonly FieldPolicy<T>[],
  existing: T,
  incoming: Partial<T>,
  target: FillTarget
): FillResult<T> {
  const changes: Partial<T> = {}
  const conflicts: MergeConflict[] = []

  for (const { field, policy } of policies) {
    const current = existing[field]
    const next = incoming[field]
    if (next === undefined) continue

    switch (policy) {
      case 'identity':
        break

      case 'immutable':
        if (isUnset(current)) {
          changes[field] = next
        } else if (!valuesEqual(current, next)) {
          conflicts.push({
            entity: target.entity,
            key: target.key,
            field,
            existing: current,
            incoming: next,
            ...(target.sourceId ? { sourceId: target.sourceId } : {}),
          })
        }
        break

      case 'fillIfUnset':
        if (isUnset(current)) {
          changes[field] = next
        }
        break

      case 'overwrite':
        if (!valuesEqual(current, next)) {
          changes[field] = next
        }
        break

      case 'union':
        if (Array.isArray(current) && Array.isArray(next)) {
          const additions = next.filter(
            (value: unknown, index: number) =>
              !current.some((stored: unknown) => valuesEqual(stored, value)) &&
              next.findIndex((other: unknown) => valuesEqual(other, value)) === index
          )
          if (additions.length > 0) {
            Object.assign(changes, { [field]: current.concat(additions) })
          }
        } else if (isUnset(current)) {
          changes[field] = next
        }
        break
    }
  }

  return { changes, conflicts }
}

/**
 * Whether a fill produced any change
 */
export function hasChanges<T extends object>(result: FillResult<T>): boolean {
  return Object.keys(result.changes).length > 0
}
