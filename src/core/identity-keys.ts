/**
 * Identity-key derivation for every entity kind. Adapters and the merge engine
 * both go through these functions so that the same real-world entity always
 * yields the same key, whichever source it came from.
 * @module core/identity-keys
 */

import type { RelationshipType } from '../types/model.js'

const SEPARATOR = '|'

export function teamKey(canonicalName: string): string {
  return canonicalName
}

export function playerKey(externalId: number): string {
  return String(externalId)
}

/**
 * Composite match key: kick-off instant plus both canonical team names.
 *
 * @example
 * ```typescript
 * matchKey(new Date('2023-05-01T16:00:00Z'), 'Flamengo', 'Palmeiras')
 * // '2023-05-01T16:00:00.000Z|Flamengo|Palmeiras'
 * ```
 */
export function matchKey(startTime: Date, homeTeam: string, awayTeam: string): string {
  return [startTime.toISOString(), homeTeam, awayTeam].join(SEPARATOR)
}

export function competitionKey(name: string): string {
  return name
}

export function seasonKey(year: number, competition: string): string {
  return [competition, String(year)].join(SEPARATOR)
}

export function stadiumKey(canonicalName: string): string {
  return canonicalName
}

/**
 * Key under which a relationship is unique: both endpoints plus the
 * discriminating attribute, if the type has one.
 */
export function relationshipKey(
  type: RelationshipType,
  from: string,
  to: string,
  discriminator?: string
): string {
  return [type, from, to, discriminator ?? ''].join(SEPARATOR)
}
