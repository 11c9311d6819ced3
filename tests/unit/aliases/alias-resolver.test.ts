import { describe, it, expect, vi } from 'vitest'
import { AliasResolver, createTeamResolver } from '../../../src/aliases/alias-resolver.js'
import { AliasTable, loadTeamAliases } from '../../../src/aliases/alias-table.js'

function createSpyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('AliasResolver', () => {
  it('resolves the official name and a region-suffixed spelling to one team', () => {
    const resolver = createTeamResolver()

    const official = resolver.resolve('Sport Club Corinthians Paulista')
    const suffixed = resolver.resolve('Corinthians-SP')

    expect(official.canonicalName).toBe('Corinthians')
    expect(official.region).toBeUndefined()
    expect(suffixed.canonicalName).toBe('Corinthians')
    expect(suffixed.region).toBe('SP')
  })

  it('reports the official name as the display name', () => {
    const resolution = createTeamResolver().resolve('Mengão')

    expect(resolution).toEqual({
      canonicalName: 'Flamengo',
      known: true,
      displayName: 'Clube de Regatas do Flamengo',
    })
  })

  it('tells region-qualified clubs apart', () => {
    const resolver = createTeamResolver()

    expect(resolver.canonical('Botafogo-SP')).toBe('Botafogo-SP')
    expect(resolver.canonical('Botafogo-RJ')).toBe('Botafogo')
    expect(resolver.canonical('Atlético-MG')).toBe('Atlético Mineiro')
    expect(resolver.canonical('Atlético-PR')).toBe('Athletico Paranaense')
    expect(resolver.canonical('Atlético-GO')).toBe('Atlético Goianiense')
  })

  it('is idempotent over every alias of the bundled table', () => {
    const table = loadTeamAliases()
    const resolver = new AliasResolver(table)

    for (const canonical of table.canonicalNames()) {
      for (const alias of [canonical, ...table.aliasesOf(canonical)]) {
        const first = resolver.resolve(alias)
        expect(first.canonicalName).toBe(canonical)
        expect(resolver.resolve(first.displayName).canonicalName).toBe(canonical)
        expect(resolver.resolve(first.canonicalName).canonicalName).toBe(canonical)
      }
    }
  })

  it('keeps unknown names as given and logs them once', () => {
    const logger = createSpyLogger()
    const resolver = new AliasResolver(new AliasTable([]), { logger, kind: 'team' })

    const first = resolver.resolve('  Ypiranga   FC-RS ')
    const second = resolver.resolve('  Ypiranga   FC-RS ')

    expect(first).toEqual({
      canonicalName: 'Ypiranga FC-RS',
      region: 'RS',
      known: false,
      displayName: 'Ypiranga FC-RS',
    })
    expect(second).toBe(first)
    expect(logger.info).toHaveBeenCalledTimes(1)
    expect(logger.info).toHaveBeenCalledWith('No alias for team, keeping it as given', {
      raw: '  Ypiranga   FC-RS ',
      canonicalName: 'Ypiranga FC-RS',
    })
  })

  it('keeps unknown clubs that differ only by region apart', () => {
    const resolver = createTeamResolver()

    const potiguar = resolver.resolve('América-RN')
    const recife = resolver.resolve('América-PE')

    expect(potiguar).toEqual({
      canonicalName: 'América-RN',
      region: 'RN',
      known: false,
      displayName: 'América-RN',
    })
    expect(recife.canonicalName).toBe('América-PE')
    expect(resolver.resolve('América-MG').canonicalName).toBe('América Mineiro')
  })

  it('memoizes lookups', () => {
    const resolver = createTeamResolver()

    resolver.resolve('Inter')
    resolver.resolve('Inter')
    resolver.resolve('Vasco')

    expect(resolver.getCacheStats()).toEqual({ hits: 1, misses: 2, size: 2 })
  })

  it('exposes the aliases of a canonical name', () => {
    expect(createTeamResolver().aliasesOf('Internacional')).toEqual([
      'Sport Club Internacional',
      'SC Internacional',
      'Inter',
    ])
  })
})
