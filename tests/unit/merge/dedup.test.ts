import { describe, it, expect, beforeEach } from 'vitest'
import { createTeamResolver } from '../../../src/aliases/alias-resolver.js'
import { TeamDeduplicator } from '../../../src/merge/dedup.js'
import { MergeEngine } from '../../../src/merge/merge-engine.js'
import { InMemoryGraphStore } from '../../../src/store/in-memory-graph-store.js'
import { QueryEngine } from '../../../src/query/query-engine.js'
import { NodeNotFoundError } from '../../../src/store/store-error.js'
import { createMatchRecord, createPlayerRecord, fixedClock, teamRef } from '../../fixtures/records.js'

const FOLDED_KEY = '2023-05-08T16:00:00.000Z|Palmeiras|Mengão'
const REKEYED_KEY = '2023-05-08T16:00:00.000Z|Palmeiras|Flamengo'

describe('TeamDeduplicator', () => {
  let store: InMemoryGraphStore
  let engine: MergeEngine
  let deduplicator: TeamDeduplicator

  beforeEach(async () => {
    store = new InMemoryGraphStore()
    engine = new MergeEngine(store, { clock: fixedClock })
    deduplicator = new TeamDeduplicator(store, createTeamResolver())

    // Teams stored under an unresolved spelling, as after an import with an incomplete table
    await engine.merge(
      createMatchRecord({ start: '2023-05-01T16:00:00Z', home: 'Flamengo', away: 'Palmeiras', homeGoals: 2, awayGoals: 1 })
    )
    await engine.merge(
      createMatchRecord({ start: '2023-05-08T16:00:00Z', home: 'Palmeiras', away: 'Mengão', homeGoals: 0, awayGoals: 0 })
    )
  })

  it('folds teams whose names resolve to another canonical name', async () => {
    const report = await deduplicator.deduplicateTeams()

    expect(report).toEqual({
      folded: [{ from: 'Mengão', to: 'Flamengo' }],
      refused: [],
      rekeyedMatches: [{ from: FOLDED_KEY, to: REKEYED_KEY }],
      conflicts: [],
    })
    expect(await store.getNode('team', 'Mengão')).toBeNull()
    expect((await store.getNode('team', 'Flamengo'))?.aliases).toEqual(['Mengão'])
  })

  it('re-keys matches and moves their relationships', async () => {
    await deduplicator.deduplicateTeams()

    expect(await store.getNode('match', FOLDED_KEY)).toBeNull()
    expect(await store.getNode('match', REKEYED_KEY)).toMatchObject({
      homeTeam: 'Palmeiras',
      awayTeam: 'Flamengo',
      homeGoals: 0,
      awayGoals: 0,
    })
    const away = await store.relationshipsFrom('PLAYED_AWAY', 'Flamengo')
    expect(away.map((r) => r.to)).toEqual([REKEYED_KEY])
    expect(await store.relationshipsFrom('COMPETES_IN', 'Flamengo')).toHaveLength(1)
  })

  it('rewrites player clubs', async () => {
    await engine.merge(createPlayerRecord({ club: teamRef('Mengão') }))

    await deduplicator.deduplicateTeams()

    expect((await store.getNode('player', '1001'))?.club).toBe('Flamengo')
    const memberships = await store.relationshipsFrom('BELONGS_TO', '1001')
    expect(memberships.map((m) => m.to)).toEqual(['Flamengo'])
  })

  it('is a no-op once every team is canonical', async () => {
    await deduplicator.deduplicateTeams()

    expect(await deduplicator.deduplicateTeams()).toEqual({
      folded: [],
      refused: [],
      rekeyedMatches: [],
      conflicts: [],
    })
  })

  it('merges into an existing match and reports disagreeing scores', async () => {
    await engine.merge(
      createMatchRecord({ start: '2023-05-08T16:00:00Z', home: 'Palmeiras', away: 'Flamengo', homeGoals: 1, awayGoals: 0 })
    )

    const report = await deduplicator.mergeTeams('Mengão', 'Flamengo')

    expect(report.conflicts.map((c) => [c.field, c.existing, c.incoming])).toEqual([['homeGoals', 1, 0]])
    expect(await store.count('match')).toBe(2)
    expect((await store.getNode('match', REKEYED_KEY))?.homeGoals).toBe(1)
  })

  it('refuses to fold two teams that have played each other', async () => {
    const derbyKey = '2023-05-15T16:00:00.000Z|Flamengo|Mengão'
    await engine.merge(
      createMatchRecord({ start: '2023-05-15T16:00:00Z', home: 'Flamengo', away: 'Mengão', homeGoals: 2, awayGoals: 1 })
    )

    const report = await deduplicator.deduplicateTeams()

    expect(report).toEqual({
      folded: [],
      refused: [{ from: 'Mengão', to: 'Flamengo', matches: [derbyKey] }],
      rekeyedMatches: [],
      conflicts: [],
    })
    expect(await store.getNode('team', 'Mengão')).not.toBeNull()
    expect(await store.getNode('match', derbyKey)).toMatchObject({ homeTeam: 'Flamengo', awayTeam: 'Mengão' })
    expect((await store.relationshipsFrom('PLAYED_HOME', 'Flamengo')).map((r) => r.to)).toEqual([
      '2023-05-01T16:00:00.000Z|Flamengo|Palmeiras',
      derbyKey,
    ])
    expect(await store.relationshipsFrom('PLAYED_AWAY', 'Flamengo')).toEqual([])

    const stats = await new QueryEngine(store, createTeamResolver()).teamStatistics('Flamengo')
    expect(stats).toMatchObject({ played: 2, wins: 2, draws: 0, losses: 0, goalsFor: 4, goalsAgainst: 2 })
  })

  it('creates the target team when it does not exist', async () => {
    const report = await deduplicator.mergeTeams('Palmeiras', 'Verdão FC')

    expect(report.folded).toEqual([{ from: 'Palmeiras', to: 'Verdão FC' }])
    expect(await store.getNode('team', 'Verdão FC')).toMatchObject({ name: 'Verdão FC', aliases: ['Palmeiras'] })
  })

  it('throws for an unknown source team', async () => {
    await expect(deduplicator.mergeTeams('Ypiranga', 'Flamengo')).rejects.toBeInstanceOf(NodeNotFoundError)
  })
})
