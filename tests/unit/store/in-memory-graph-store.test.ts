import { describe, it, expect, beforeEach } from 'vitest'
import { InMemoryGraphStore } from '../../../src/store/in-memory-graph-store.js'
import { DuplicateNodeError, NodeNotFoundError } from '../../../src/store/store-error.js'
import type { MatchNode, TeamNode } from '../../../src/types/model.js'
import { FIXED_NOW } from '../../fixtures/records.js'

function team(name: string, overrides: Partial<TeamNode> = {}): TeamNode {
  return { key: name, createdAt: FIXED_NOW, name, aliases: [], ...overrides }
}

function match(key: string, homeTeam: string, awayTeam: string): MatchNode {
  return {
    key,
    createdAt: FIXED_NOW,
    startTime: new Date('2023-05-01T16:00:00Z'),
    homeTeam,
    awayTeam,
    homeGoals: 2,
    awayGoals: 1,
    season: 2023,
    competition: 'Brasileirão Série A',
  }
}

describe('InMemoryGraphStore', () => {
  let store: InMemoryGraphStore

  beforeEach(() => {
    store = new InMemoryGraphStore()
  })

  describe('nodes', () => {
    it('creates and reads a node', async () => {
      await store.createNode('team', team('Santos', { region: 'SP' }))

      expect(await store.getNode('team', 'Santos')).toEqual(team('Santos', { region: 'SP' }))
      expect(await store.getNode('team', 'Bahia')).toBeNull()
    })

    it('rejects a duplicate key', async () => {
      await store.createNode('team', team('Santos'))

      await expect(store.createNode('team', team('Santos'))).rejects.toThrow(DuplicateNodeError)
    })

    it('keeps kinds apart', async () => {
      await store.createNode('team', team('Santos'))

      expect(await store.getNode('stadium', 'Santos')).toBeNull()
      expect(await store.count('team')).toBe(1)
      expect(await store.count('stadium')).toBe(0)
    })

    it('returns copies', async () => {
      await store.createNode('team', team('Santos', { aliases: ['Santos FC'] }))

      const copy = await store.getNode('team', 'Santos')
      copy?.aliases.push('Peixe')

      expect((await store.getNode('team', 'Santos'))?.aliases).toEqual(['Santos FC'])
    })

    it('updates attributes but never the key or creation time', async () => {
      await store.createNode('team', team('Santos'))

      const updated = await store.updateNode('team', 'Santos', {
        region: 'SP',
        key: 'Other',
        createdAt: new Date('2030-01-01T00:00:00Z'),
      })

      expect(updated.key).toBe('Santos')
      expect(updated.createdAt).toEqual(FIXED_NOW)
      expect(updated.region).toBe('SP')
    })

    it('fails to update a missing node', async () => {
      await expect(store.updateNode('team', 'Nobody', { region: 'SP' })).rejects.toThrow(
        NodeNotFoundError
      )
    })

    it('finds nodes by attribute equality in insertion order', async () => {
      await store.createNode('team', team('Santos', { region: 'SP' }))
      await store.createNode('team', team('Bahia', { region: 'BA' }))
      await store.createNode('team', team('Palmeiras', { region: 'SP' }))

      const paulistas = await store.findNodes('team', { region: 'SP' })

      expect(paulistas.map((t) => t.key)).toEqual(['Santos', 'Palmeiras'])
      expect(await store.findNodes('team')).toHaveLength(3)
    })

    it('searches names ignoring case and accents', async () => {
      await store.createNode('team', team('Grêmio'))
      await store.createNode('team', team('Goiás'))

      const found = await store.searchByName('team', 'gremio')

      expect(found.map((t) => t.name)).toEqual(['Grêmio'])
      expect(await store.searchByName('team', '   ')).toEqual([])
    })
  })

  describe('relationships', () => {
    beforeEach(async () => {
      await store.createNode('team', team('Flamengo'))
      await store.createNode('team', team('Palmeiras'))
      await store.createNode('match', match('m1', 'Flamengo', 'Palmeiras'))
    })

    it('creates and reads relationships through both indexes', async () => {
      await store.createRelationship({
        type: 'PLAYED_HOME',
        from: 'Flamengo',
        to: 'm1',
        properties: { goalsScored: 2, goalsConceded: 1, result: 'WIN' },
        createdAt: FIXED_NOW,
      })

      expect(await store.relationshipsFrom('PLAYED_HOME', 'Flamengo')).toHaveLength(1)
      expect(await store.relationshipsTo('PLAYED_HOME', 'm1')).toHaveLength(1)
      expect(await store.relationshipsFrom('PLAYED_AWAY', 'Flamengo')).toEqual([])
      expect(
        (await store.getRelationship({ type: 'PLAYED_HOME', from: 'Flamengo', to: 'm1' }))
          ?.properties.result
      ).toBe('WIN')
    })

    it('requires both endpoints to exist', async () => {
      await expect(
        store.createRelationship({
          type: 'PLAYED_HOME',
          from: 'Santos',
          to: 'm1',
          properties: { goalsScored: 0, goalsConceded: 0, result: 'DRAW' },
          createdAt: FIXED_NOW,
        })
      ).rejects.toThrow("No team with key 'Santos'")
    })

    it('distinguishes parallel edges by discriminator', async () => {
      await store.createNode('competition', {
        key: 'Brasileirão Série A',
        createdAt: FIXED_NOW,
        name: 'Brasileirão Série A',
      })
      for (const season of [2022, 2023]) {
        await store.createRelationship({
          type: 'COMPETES_IN',
          from: 'Flamengo',
          to: 'Brasileirão Série A',
          discriminator: String(season),
          properties: { season },
          createdAt: FIXED_NOW,
        })
      }

      const edges = await store.relationshipsFrom('COMPETES_IN', 'Flamengo')

      expect(edges.map((e) => e.properties.season)).toEqual([2022, 2023])
      await expect(
        store.createRelationship({
          type: 'COMPETES_IN',
          from: 'Flamengo',
          to: 'Brasileirão Série A',
          discriminator: '2023',
          properties: { season: 2023 },
          createdAt: FIXED_NOW,
        })
      ).rejects.toThrow(DuplicateNodeError)
    })

    it('updates relationship properties', async () => {
      const id = { type: 'PLAYED_HOME', from: 'Flamengo', to: 'm1' } as const
      await store.createRelationship({
        ...id,
        properties: { goalsScored: 2, goalsConceded: 1, result: 'WIN' },
        createdAt: FIXED_NOW,
      })

      const updated = await store.updateRelationship(id, { shots: 14 })

      expect(updated.properties).toEqual({ goalsScored: 2, goalsConceded: 1, result: 'WIN', shots: 14 })
    })

    it('deletes a node together with its relationships', async () => {
      await store.createRelationship({
        type: 'PLAYED_HOME',
        from: 'Flamengo',
        to: 'm1',
        properties: { goalsScored: 2, goalsConceded: 1, result: 'WIN' },
        createdAt: FIXED_NOW,
      })

      expect(await store.deleteNode('match', 'm1')).toBe(true)
      expect(await store.relationshipsFrom('PLAYED_HOME', 'Flamengo')).toEqual([])
      expect(await store.deleteNode('match', 'm1')).toBe(false)
    })

    it('redirects relationships and drops the ones that would duplicate', async () => {
      await store.createNode('team', team('Flamengo-RJ'))
      await store.createNode('competition', {
        key: 'Copa do Brasil',
        createdAt: FIXED_NOW,
        name: 'Copa do Brasil',
      })
      for (const from of ['Flamengo', 'Flamengo-RJ']) {
        await store.createRelationship({
          type: 'COMPETES_IN',
          from,
          to: 'Copa do Brasil',
          discriminator: '2023',
          properties: { season: 2023 },
          createdAt: FIXED_NOW,
        })
      }
      await store.createRelationship({
        type: 'PLAYED_AWAY',
        from: 'Flamengo-RJ',
        to: 'm1',
        properties: { goalsScored: 1, goalsConceded: 2, result: 'LOSS' },
        createdAt: FIXED_NOW,
      })

      const moved = await store.redirectNode('team', 'Flamengo-RJ', 'Flamengo')

      expect(moved).toBe(1)
      expect(await store.getNode('team', 'Flamengo-RJ')).toBeNull()
      expect(await store.relationshipsFrom('COMPETES_IN', 'Flamengo')).toHaveLength(1)
      expect((await store.relationshipsFrom('PLAYED_AWAY', 'Flamengo')).map((e) => e.to)).toEqual(['m1'])
    })

    it('counts every kind when no kind is given', async () => {
      expect(await store.count()).toBe(3)

      await store.clear()

      expect(await store.count()).toBe(0)
    })
  })
})
