/**
 * Alias resolution: raw team or stadium spellings to canonical names
 * @module aliases/alias-resolver
 */

import { normalizeWhitespace } from '../core/normalizers/basic.js'
import type { Logger } from '../utils/logger.js'
import { createSilentLogger } from '../utils/logger.js'
import type { AliasTable } from './alias-table.js'
import { loadStadiumAliases, loadTeamAliases, splitRegionSuffix } from './alias-table.js'
import { MemoCache } from './memo-cache.js'
import type { MemoCacheStats } from './memo-cache.js'

/**
 * Outcome of resolving one raw name
 */
export interface Resolution {
  /** Canonical name; the whitespace-collapsed input when no alias matched */
  canonicalName: string
  /** Region code taken from a `-XX` suffix, when present */
  region?: string
  /** Whether an alias table entry matched */
  known: boolean
  /** Official long form when known, otherwise the canonical name */
  displayName: string
}

export interface AliasResolverOptions {
  logger?: Logger
  /** Label used in log messages (default: 'name') */
  kind?: string
}

/**
 * Deterministic, memoized resolver over one alias table.
 *
 * Resolution steps: collapse whitespace, split a known region suffix, look
 * the remainder up diacritic- and case-insensitively, and fall back to the
 * whole input, suffix included, when nothing matches. Unknown names are not errors; each
 * distinct one is logged once at info level.
 *
 * @example
 * ```typescript
 * const resolver = createTeamResolver()
 * resolver.resolve('Corinthians-SP')
 * // { canonicalName: 'Corinthians', region: 'SP', known: true, ... }
 * resolver.resolve('Sport Club Corinthians Paulista')
 * // { canonicalName: 'Corinthians', known: true, ... }
 * ```
 */
export class AliasResolver {
  private readonly cache = new MemoCache<Readonly<Resolution>>()
  private readonly logger: Logger
  private readonly kind: string

  constructor(
    private readonly table: AliasTable,
    options: AliasResolverOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
    this.kind = options.kind ?? 'name'
  }

  resolve(raw: string): Readonly<Resolution> {
    return this.cache.getOrCompute(
      raw,
      (key) => this.compute(key),
      (resolution) => {
        if (!resolution.known) {
          this.logger.info(`No alias for ${this.kind}, keeping it as given`, {
            raw,
            canonicalName: resolution.canonicalName,
          })
        }
      }
    )
  }

  /**
   * Canonical name only
   */
  canonical(raw: string): string {
    return this.resolve(raw).canonicalName
  }

  aliasesOf(canonical: string): string[] {
    return this.table.aliasesOf(canonical)
  }

  getCacheStats(): MemoCacheStats {
    return this.cache.getStats()
  }

  private compute(raw: string): Resolution {
    const { base, region } = splitRegionSuffix(raw)
    const canonical = this.table.lookup(base, region)

    if (canonical === undefined) {
      const name = normalizeWhitespace(raw)
      return region
        ? { canonicalName: name, region, known: false, displayName: name }
        : { canonicalName: name, known: false, displayName: name }
    }

    const displayName = this.table.officialNameOf(canonical) ?? canonical
    return region
      ? { canonicalName: canonical, region, known: true, displayName }
      : { canonicalName: canonical, known: true, displayName }
  }
}

export function createTeamResolver(logger?: Logger): AliasResolver {
  return new AliasResolver(loadTeamAliases(), { logger, kind: 'team' })
}

export function createStadiumResolver(logger?: Logger): AliasResolver {
  return new AliasResolver(loadStadiumAliases(), { logger, kind: 'stadium' })
}
