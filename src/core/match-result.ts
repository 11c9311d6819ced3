/**
 * Match outcome derivation
 * @module core/match-result
 */

import type { MatchResult } from '../types/model.js'

/**
 * Result for the side that scored `goalsFor`. Always derived from the score,
 * never read from a source.
 *
 * @example
 * ```typescript
 * deriveResult(2, 1) // 'WIN'
 * deriveResult(0, 0) // 'DRAW'
 * ```
 */
export function deriveResult(goalsFor: number, goalsAgainst: number): MatchResult {
  if (goalsFor > goalsAgainst) return 'WIN'
  if (goalsFor < goalsAgainst) return 'LOSS'
  return 'DRAW'
}

/**
 * League points for a result: three for a win, one for a draw
 */
export function pointsFor(result: MatchResult): number {
  return result === 'WIN' ? 3 : result === 'DRAW' ? 1 : 0
}
