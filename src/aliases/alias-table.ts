/**
 * Static alias tables for team and stadium names
 * @module aliases/alias-table
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { foldName, normalizeWhitespace } from '../core/normalizers/basic.js'
import { ConfigurationError, errorMessage } from '../utils/errors.js'

/**
 * Two-letter region codes recognised as name suffixes ("Corinthians-SP").
 */
export const REGION_CODES: ReadonlySet<string> = new Set([
  'AC', 'AL', 'AM', 'AP', 'BA', 'CE', 'DF', 'ES', 'GO',
  'MA', 'MG', 'MS', 'MT', 'PA', 'PB', 'PE', 'PI', 'PR',
  'RJ', 'RN', 'RO', 'RR', 'RS', 'SC', 'SE', 'SP', 'TO',
])

export const aliasEntrySchema = z.object({
  canonical: z.string().trim().min(1),
  officialName: z.string().trim().min(1).optional(),
  aliases: z.array(z.string().trim().min(1)).default([]),
})

export const aliasFileSchema = z.array(aliasEntrySchema)

export type AliasEntry = z.infer<typeof aliasEntrySchema>

export const TEAM_ALIASES_URL = new URL('../../data/team-aliases.json', import.meta.url)
export const STADIUM_ALIASES_URL = new URL('../../data/stadium-aliases.json', import.meta.url)

const REGION_SUFFIX = /^(.*\S)\s*-\s*([A-Za-z]{2})$/

/**
 * Splits a trailing `-XX` region suffix off a name when XX is a known region
 * code. Unknown suffixes are left in place.
 *
 * @example
 * ```typescript
 * splitRegionSuffix('Corinthians-SP') // { base: 'Corinthians', region: 'SP' }
 * splitRegionSuffix('Beira-Rio')      // { base: 'Beira-Rio' }
 * splitRegionSuffix('Team-XY')        // { base: 'Team-XY' }
 * ```
 */
export function splitRegionSuffix(value: string): { base: string; region?: string } {
  const collapsed = normalizeWhitespace(value)
  const match = REGION_SUFFIX.exec(collapsed)
  if (match) {
    const [, base, suffix] = match
    const region = suffix.toUpperCase()
    if (REGION_CODES.has(region)) {
      return { base: normalizeWhitespace(base), region }
    }
  }
  return { base: collapsed }
}

function indexKey(base: string, region?: string): string {
  const folded = foldName(base)
  return region ? `${folded}|${region}` : folded
}

/**
 * Lookup table from folded spellings to canonical names.
 *
 * Spellings carrying a region suffix are indexed under a region-qualified key
 * and only match inputs with the same region. Every canonical and official
 * name is indexed as one of its own spellings.
 */
export class AliasTable {
  private readonly index: Map<string, string> = new Map()
  private readonly spellings: Map<string, string[]> = new Map()
  private readonly officialNames: Map<string, string> = new Map()

  constructor(entries: readonly AliasEntry[]) {
    for (const entry of entries) {
      const canonical = normalizeWhitespace(entry.canonical)
      if (this.spellings.has(canonical)) {
        throw new ConfigurationError(
          `Duplicate canonical name '${canonical}' in alias table`,
          'canonical'
        )
      }

      const names = [canonical, ...entry.aliases.map(normalizeWhitespace)]
      if (entry.officialName) names.push(normalizeWhitespace(entry.officialName))
      for (const name of names) {
        const { base, region } = splitRegionSuffix(name)
        this.register(indexKey(base, region), canonical)
      }

      this.spellings.set(canonical, entry.aliases.map(normalizeWhitespace))
      if (entry.officialName) {
        this.officialNames.set(canonical, entry.officialName)
      }
    }
  }

  private register(key: string, canonical: string): void {
    const existing = this.index.get(key)
    if (existing !== undefined && existing !== canonical) {
      throw new ConfigurationError(
        `Alias '${key}' maps to both '${existing}' and '${canonical}'`,
        'aliases',
        { key, existing, canonical }
      )
    }
    this.index.set(key, canonical)
  }

  /**
   * Finds the canonical name for a suffix-free name. A region-qualified
   * spelling takes precedence over the bare one.
   */
  lookup(base: string, region?: string): string | undefined {
    if (region) {
      const qualified = this.index.get(indexKey(base, region))
      if (qualified !== undefined) return qualified
    }
    return this.index.get(indexKey(base))
  }

  aliasesOf(canonical: string): string[] {
    return [...(this.spellings.get(canonical) ?? [])]
  }

  officialNameOf(canonical: string): string | undefined {
    return this.officialNames.get(canonical)
  }

  canonicalNames(): string[] {
    return [...this.spellings.keys()]
  }

  get size(): number {
    return this.spellings.size
  }

  /**
   * Builds a table from parsed JSON, validating its shape.
   *
   * @throws {ConfigurationError} If the data is not a list of alias entries
   */
  static fromJson(data: unknown, source = 'alias table'): AliasTable {
    const parsed = aliasFileSchema.safeParse(data)
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid ${source}: ${parsed.error.message}`, undefined, {
        source,
        issues: parsed.error.issues,
      })
    }
    return new AliasTable(parsed.data)
  }
}

/**
 * Reads and validates an alias file.
 *
 * @throws {ConfigurationError} If the file cannot be read or is malformed
 */
export function loadAliasTable(url: URL): AliasTable {
  let data: unknown
  try {
    data = JSON.parse(readFileSync(url, 'utf8'))
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read alias file ${url.pathname}: ${errorMessage(error)}`,
      undefined,
      { path: url.pathname }
    )
  }
  return AliasTable.fromJson(data, url.pathname)
}

export function loadTeamAliases(): AliasTable {
  return loadAliasTable(TEAM_ALIASES_URL)
}

export function loadStadiumAliases(): AliasTable {
  return loadAliasTable(STADIUM_ALIASES_URL)
}
