import { describe, it, expect, beforeEach, vi } from 'vitest'
import { MergeEngine, correlationLockKey, lockKey } from '../../../src/merge/merge-engine.js'
import { InMemoryGraphStore } from '../../../src/store/in-memory-graph-store.js'
import { CorrelationMissError } from '../../../src/sources/ingestion-error.js'
import type { NodeAttributes, NodeKind, NodeTypes } from '../../../src/types/model.js'
import type { Logger } from '../../../src/utils/logger.js'
import {
  createMatchRecord,
  createPlayerRecord,
  createStatsRecord,
  createVenueRecord,
  fixedClock,
  teamRef,
} from '../../fixtures/records.js'

const FLAMENGO_PALMEIRAS = {
  start: '2023-05-01T16:00:00Z',
  home: 'Flamengo',
  away: 'Palmeiras',
  homeGoals: 2,
  awayGoals: 1,
}
const MATCH_KEY = '2023-05-01T16:00:00.000Z|Flamengo|Palmeiras'

class SlowFirstLookupStore extends InMemoryGraphStore {
  delayNextLookup = false

  async findNodes<K extends NodeKind>(
    kind: K,
    filter?: Partial<NodeAttributes<K>>
  ): Promise<NodeTypes[K][]> {
    if (this.delayNextLookup) {
      this.delayNextLookup = false
      await new Promise((resolve) => setTimeout(resolve, 20))
    }
    return super.findNodes(kind, filter)
  }
}

describe('MergeEngine', () => {
  let store: InMemoryGraphStore
  let engine: MergeEngine

  beforeEach(() => {
    store = new InMemoryGraphStore()
    engine = new MergeEngine(store, { clock: fixedClock })
  })

  it('namespaces lock keys by kind', () => {
    expect(lockKey('team', 'Santos')).toBe('team:Santos')
    expect(correlationLockKey('2023-05-01')).toBe('correlation:2023-05-01')
  })

  describe('match records', () => {
    it('creates the match with its teams, competition, season and links', async () => {
      const result = await engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))

      expect(result.outcome).toBe('created')
      expect(result.entities.map((e) => `${e.kind}:${e.key}`)).toEqual([
        'competition:Brasileirão Série A',
        'season:Brasileirão Série A|2023',
        'team:Flamengo',
        'team:Palmeiras',
        `match:${MATCH_KEY}`,
      ])
      expect(result.relationships.map((r) => r.type)).toEqual([
        'PLAYED_HOME',
        'PLAYED_AWAY',
        'IN_COMPETITION',
        'IN_SEASON',
        'COMPETES_IN',
        'COMPETES_IN',
      ])
      expect(await store.count()).toBe(5)
    })

    it('derives results on both PLAYED relationships', async () => {
      await engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))

      const home = await store.getRelationship({ type: 'PLAYED_HOME', from: 'Flamengo', to: MATCH_KEY })
      const away = await store.getRelationship({ type: 'PLAYED_AWAY', from: 'Palmeiras', to: MATCH_KEY })

      expect(home?.properties).toEqual({ goalsScored: 2, goalsConceded: 1, result: 'WIN' })
      expect(away?.properties).toEqual({ goalsScored: 1, goalsConceded: 2, result: 'LOSS' })
    })

    it('records one COMPETES_IN per team and season', async () => {
      await engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))
      await engine.merge(createMatchRecord({ ...FLAMENGO_PALMEIRAS, start: '2024-05-01T16:00:00Z', season: 2024 }))

      const seasons = await store.relationshipsFrom('COMPETES_IN', 'Flamengo')

      expect(seasons.map((r) => r.properties.season).sort()).toEqual([2023, 2024])
    })

    it('is idempotent', async () => {
      const record = createMatchRecord(FLAMENGO_PALMEIRAS)
      await engine.merge(record)
      const countBefore = await store.count()

      const again = await engine.merge(record)

      expect(again.outcome).toBe('unchanged')
      expect(again.conflicts).toEqual([])
      expect(await store.count()).toBe(countBefore)
      expect(await store.relationshipsFrom('PLAYED_HOME', 'Flamengo')).toHaveLength(1)
    })

    it('keeps the first-seen score and reports the conflict', async () => {
      const warn = vi.fn()
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() }
      engine = new MergeEngine(store, { clock: fixedClock, logger })
      await engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))

      const result = await engine.merge(
        createMatchRecord({ ...FLAMENGO_PALMEIRAS, homeGoals: 3, sourceId: 'late-feed' })
      )

      expect(result.outcome).toBe('unchanged')
      expect(result.conflicts).toEqual([
        {
          entity: 'match',
          key: MATCH_KEY,
          field: 'homeGoals',
          existing: 2,
          incoming: 3,
          sourceId: 'late-feed',
        },
      ])
      expect((await store.getNode('match', MATCH_KEY))?.homeGoals).toBe(2)
      expect(warn).toHaveBeenCalledWith(
        'Conflicting value rejected, keeping the stored one',
        expect.objectContaining({ field: 'homeGoals', existing: 2, incoming: 3 })
      )
    })

    it('reports an update when a later record fills an empty field', async () => {
      await engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))

      const result = await engine.merge(createMatchRecord({ ...FLAMENGO_PALMEIRAS, round: '5' }))

      expect(result.outcome).toBe('updated')
      expect((await store.getNode('match', MATCH_KEY))?.round).toBe('5')
    })

    it('remembers raw spellings as team aliases', async () => {
      const record = createMatchRecord(FLAMENGO_PALMEIRAS)
      record.homeTeam = teamRef('Flamengo', { rawName: 'Mengão', region: 'RJ' })

      await engine.merge(record)

      expect(await store.getNode('team', 'Flamengo')).toMatchObject({
        name: 'Flamengo',
        region: 'RJ',
        aliases: ['Mengão'],
      })
    })

    it('links the stadium when the record carries one', async () => {
      await engine.merge(createMatchRecord({ ...FLAMENGO_PALMEIRAS, stadium: { name: 'Maracanã', city: 'Rio de Janeiro' } }))

      const hosts = await store.relationshipsFrom('HOSTED_AT', MATCH_KEY)

      expect(hosts.map((h) => h.to)).toEqual(['Maracanã'])
      expect((await store.getNode('stadium', 'Maracanã'))?.city).toBe('Rio de Janeiro')
    })
  })

  describe('player records', () => {
    it('creates the player and their club membership', async () => {
      const result = await engine.merge(
        createPlayerRecord({ club: teamRef('Flamengo', { rawName: 'Mengão' }), jerseyNumber: 9 })
      )

      expect(result.outcome).toBe('created')
      expect(await store.getNode('player', '1001')).toMatchObject({ name: 'Test Player', club: 'Flamengo' })
      const memberships = await store.relationshipsFrom('BELONGS_TO', '1001')
      expect(memberships.map((m) => [m.to, m.properties.jerseyNumber])).toEqual([['Flamengo', 9]])
    })

    it('moves a player to a new club', async () => {
      await engine.merge(createPlayerRecord({ club: teamRef('Flamengo') }))

      const result = await engine.merge(createPlayerRecord({ club: teamRef('Santos') }))

      expect(result.outcome).toBe('updated')
      expect(result.relationships).toContainEqual({
        type: 'BELONGS_TO',
        from: '1001',
        to: 'Flamengo',
        outcome: 'removed',
      })
      const memberships = await store.relationshipsFrom('BELONGS_TO', '1001')
      expect(memberships.map((m) => m.to)).toEqual(['Santos'])
      expect((await store.getNode('player', '1001'))?.club).toBe('Santos')
    })

    it('overwrites volatile ratings but keeps nationality', async () => {
      await engine.merge(createPlayerRecord())

      const result = await engine.merge(createPlayerRecord({ overall: 83, nationality: 'Portugal' }))

      expect(result.outcome).toBe('updated')
      expect(result.conflicts.map((c) => c.field)).toEqual(['nationality'])
      expect(await store.getNode('player', '1001')).toMatchObject({ overall: 83, nationality: 'Brazil' })
    })
  })

  describe('statistics records', () => {
    beforeEach(async () => {
      await engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))
    })

    it('fills match statistics and per-side counters', async () => {
      const result = await engine.merge(createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras'))

      expect(result.outcome).toBe('updated')
      expect((await store.getNode('match', MATCH_KEY))?.stats).toEqual({
        home: { shots: 14, corners: 6 },
        away: { shots: 9, corners: 3 },
      })
      const away = await store.getRelationship({ type: 'PLAYED_AWAY', from: 'Palmeiras', to: MATCH_KEY })
      expect(away?.properties).toEqual({
        goalsScored: 1,
        goalsConceded: 2,
        result: 'LOSS',
        shots: 9,
        corners: 3,
      })
    })

    it('does not replace statistics already stored', async () => {
      await engine.merge(createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras'))

      const result = await engine.merge(
        createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras', {
          stats: { home: { shots: 30 }, away: { shots: 1 } },
        })
      )

      expect(result.outcome).toBe('unchanged')
      expect((await store.getNode('match', MATCH_KEY))?.stats?.home.shots).toBe(14)
    })

    it('keeps per-side counters in step with the stored statistics', async () => {
      await engine.merge(
        createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras', {
          stats: { home: { shots: 14 }, away: { shots: 9 } },
        })
      )

      const result = await engine.merge(
        createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras', {
          stats: { home: { corners: 6 }, away: { corners: 3 } },
        })
      )

      expect(result.outcome).toBe('unchanged')
      expect((await store.getNode('match', MATCH_KEY))?.stats).toEqual({
        home: { shots: 14 },
        away: { shots: 9 },
      })
      const home = await store.getRelationship({ type: 'PLAYED_HOME', from: 'Flamengo', to: MATCH_KEY })
      expect(home?.properties).toEqual({ goalsScored: 2, goalsConceded: 1, result: 'WIN', shots: 14 })
    })

    it('applies rows for one match in call order when the store answers unevenly', async () => {
      const slowStore = new SlowFirstLookupStore()
      const slowEngine = new MergeEngine(slowStore, { clock: fixedClock })
      await slowEngine.merge(createMatchRecord(FLAMENGO_PALMEIRAS))
      slowStore.delayNextLookup = true

      await Promise.all([
        slowEngine.merge(createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras')),
        slowEngine.merge(
          createStatsRecord('2023-05-01T16:00:00Z', 'Flamengo', 'Palmeiras', {
            stats: { home: { shots: 30 }, away: { shots: 1 } },
          })
        ),
      ])

      expect((await slowStore.getNode('match', MATCH_KEY))?.stats?.home.shots).toBe(14)
    })

    it('throws when no match correlates', async () => {
      const error = await engine
        .merge(createStatsRecord('2023-06-01T16:00:00Z', 'Flamengo', 'Palmeiras'))
        .catch((e: unknown) => e)

      expect(error).toBeInstanceOf(CorrelationMissError)
      expect(error).toMatchObject({ code: 'CORRELATION_MISS', reason: 'miss' })
    })
  })

  describe('venue records', () => {
    beforeEach(async () => {
      await engine.merge(createMatchRecord({ ...FLAMENGO_PALMEIRAS, externalId: 'BR-2023-005-01' }))
    })

    it('links the correlated match to the stadium', async () => {
      const result = await engine.merge(
        createVenueRecord({ name: 'Maracanã', capacity: 78838 }, { externalId: 'BR-2023-005-01' })
      )

      expect(result.outcome).toBe('updated')
      expect((await store.relationshipsFrom('HOSTED_AT', MATCH_KEY)).map((h) => h.to)).toEqual(['Maracanã'])
    })

    it('keeps the first stadium and reports a different one', async () => {
      await engine.merge(createVenueRecord({ name: 'Maracanã' }, { externalId: 'BR-2023-005-01' }))

      const result = await engine.merge(
        createVenueRecord({ name: 'Allianz Parque' }, { externalId: 'BR-2023-005-01' })
      )

      expect(result.conflicts).toEqual([
        {
          entity: 'HOSTED_AT',
          key: MATCH_KEY,
          field: 'stadium',
          existing: 'Maracanã',
          incoming: 'Allianz Parque',
          sourceId: 'historical-archive',
        },
      ])
      expect((await store.relationshipsFrom('HOSTED_AT', MATCH_KEY)).map((h) => h.to)).toEqual(['Maracanã'])
    })

    it('repeating a venue record changes nothing', async () => {
      const record = createVenueRecord({ name: 'Maracanã' }, { externalId: 'BR-2023-005-01' })
      await engine.merge(record)

      expect((await engine.merge(record)).outcome).toBe('unchanged')
    })
  })

  it('serializes concurrent merges touching the same team', async () => {
    const results = await Promise.all([
      engine.merge(createMatchRecord(FLAMENGO_PALMEIRAS)),
      engine.merge(createMatchRecord({ ...FLAMENGO_PALMEIRAS, start: '2023-05-08T16:00:00Z', home: 'Palmeiras', away: 'Flamengo' })),
    ])

    expect(results.map((r) => r.outcome)).toEqual(['created', 'created'])
    expect(await store.count('team')).toBe(2)
    expect(await store.count('match')).toBe(2)
  })
})
