/**
 * In-memory graph store
 * @module store/in-memory-graph-store
 */

import { relationshipKey } from '../core/identity-keys.js'
import { foldName } from '../core/normalizers/basic.js'
import type {
  NodeAttributes,
  NodeKind,
  NodeTypes,
  Relationship,
  RelationshipType,
  RelationshipTypes,
} from '../types/model.js'
import { NODE_KINDS, RELATIONSHIP_ENDPOINTS, RELATIONSHIP_TYPES } from '../types/model.js'
import { valuesEqual } from '../utils/equality.js'
import type { GraphStore, RelationshipId, SearchableKind } from './graph-store.js'
import { DuplicateNodeError, NodeNotFoundError } from './store-error.js'

type NodeTables = { [K in NodeKind]: Map<string, NodeTypes[K]> }

type RelationshipTables = { [R in RelationshipType]: RelationshipBucket<R> }

type Side = 'from' | 'to'

function idKey(id: RelationshipId): string {
  return relationshipKey(id.type, id.from, id.to, id.discriminator)
}

/**
 * Relationships of one type with adjacency indexes on both endpoints
 */
class RelationshipBucket<R extends RelationshipType> {
  private readonly edges = new Map<string, Relationship<R>>()
  private readonly index: Record<Side, Map<string, Set<string>>> = {
    from: new Map(),
    to: new Map(),
  }

  get(key: string): Relationship<R> | undefined {
    return this.edges.get(key)
  }

  has(key: string): boolean {
    return this.edges.has(key)
  }

  set(relationship: Relationship<R>): void {
    const key = idKey(relationship)
    this.edges.set(key, relationship)
    this.link('from', relationship.from, key)
    this.link('to', relationship.to, key)
  }

  remove(key: string): boolean {
    const relationship = this.edges.get(key)
    if (!relationship) return false
    this.edges.delete(key)
    this.unlink('from', relationship.from, key)
    this.unlink('to', relationship.to, key)
    return true
  }

  touching(side: Side, nodeKey: string): Relationship<R>[] {
    const keys = this.index[side].get(nodeKey)
    if (!keys) return []
    const results: Relationship<R>[] = []
    for (const key of keys) {
      const relationship = this.edges.get(key)
      if (relationship) results.push(relationship)
    }
    return results
  }

  removeTouching(side: Side, nodeKey: string): number {
    const touching = this.touching(side, nodeKey)
    for (const relationship of touching) {
      this.remove(idKey(relationship))
    }
    return touching.length
  }

  redirect(side: Side, oldKey: string, newKey: string): number {
    let moved = 0
    for (const relationship of this.touching(side, oldKey)) {
      this.remove(idKey(relationship))
      const next: Relationship<R> =
        side === 'from' ? { ...relationship, from: newKey } : { ...relationship, to: newKey }
      if (!this.edges.has(idKey(next))) {
        this.set(next)
        moved++
      }
    }
    return moved
  }

  clear(): void {
    this.edges.clear()
    this.index.from.clear()
    this.index.to.clear()
  }

  private link(side: Side, nodeKey: string, key: string): void {
    let keys = this.index[side].get(nodeKey)
    if (!keys) {
      keys = new Set()
      this.index[side].set(nodeKey, keys)
    }
    keys.add(key)
  }

  private unlink(side: Side, nodeKey: string, key: string): void {
    const keys = this.index[side].get(nodeKey)
    if (!keys) return
    keys.delete(key)
    if (keys.size === 0) {
      this.index[side].delete(nodeKey)
    }
  }
}

/**
 * GraphStore kept in process memory. Suitable for tests and single-run
 * ingestion; contents are lost when the process exits.
 */
export class InMemoryGraphStore implements GraphStore {
  private readonly nodes: NodeTables = {
    team: new Map(),
    player: new Map(),
    match: new Map(),
    competition: new Map(),
    season: new Map(),
    stadium: new Map(),
  }

  private readonly relationships: RelationshipTables = {
    PLAYED_HOME: new RelationshipBucket<'PLAYED_HOME'>(),
    PLAYED_AWAY: new RelationshipBucket<'PLAYED_AWAY'>(),
    BELONGS_TO: new RelationshipBucket<'BELONGS_TO'>(),
    HOSTED_AT: new RelationshipBucket<'HOSTED_AT'>(),
    IN_COMPETITION: new RelationshipBucket<'IN_COMPETITION'>(),
    IN_SEASON: new RelationshipBucket<'IN_SEASON'>(),
    COMPETES_IN: new RelationshipBucket<'COMPETES_IN'>(),
  }

  async getNode<K extends NodeKind>(kind: K, key: string): Promise<NodeTypes[K] | null> {
    const node = this.table(kind).get(key)
    return node ? structuredClone(node) : null
  }

  async createNode<K extends NodeKind>(kind: K, node: NodeTypes[K]): Promise<NodeTypes[K]> {
    const table = this.table(kind)
    if (table.has(node.key)) {
      throw new DuplicateNodeError(kind, node.key)
    }
    table.set(node.key, structuredClone(node))
    return structuredClone(node)
  }

  async updateNode<K extends NodeKind>(
    kind: K,
    key: string,
    changes: Partial<NodeTypes[K]>
  ): Promise<NodeTypes[K]> {
    const table = this.table(kind)
    const existing = table.get(key)
    if (!existing) {
      throw new NodeNotFoundError(kind, key)
    }
    const updated: NodeTypes[K] = {
      ...existing,
      ...structuredClone(changes),
      key: existing.key,
      createdAt: existing.createdAt,
    }
    table.set(key, updated)
    return structuredClone(updated)
  }

  async findNodes<K extends NodeKind>(
    kind: K,
    filter: Partial<NodeAttributes<K>> = {}
  ): Promise<NodeTypes[K][]> {
    const criteria = Object.entries(filter).filter(([, value]) => value !== undefined)
    const results: NodeTypes[K][] = []
    for (const node of this.table(kind).values()) {
      const fields = new Map<string, unknown>(Object.entries(node))
      if (criteria.every(([field, value]: [string, unknown]) => valuesEqual(fields.get(field), value))) {
        results.push(structuredClone(node))
      }
    }
    return results
  }

  async deleteNode(kind: NodeKind, key: string): Promise<boolean> {
    if (!this.nodes[kind].has(key)) return false

    for (const type of RELATIONSHIP_TYPES) {
      const endpoints = RELATIONSHIP_ENDPOINTS[type]
      const bucket = this.relationships[type]
      if (endpoints.from === kind) bucket.removeTouching('from', key)
      if (endpoints.to === kind) bucket.removeTouching('to', key)
    }

    this.nodes[kind].delete(key)
    return true
  }

  async redirectNode(kind: NodeKind, fromKey: string, toKey: string): Promise<number> {
    if (!this.nodes[kind].has(fromKey)) throw new NodeNotFoundError(kind, fromKey)
    if (!this.nodes[kind].has(toKey)) throw new NodeNotFoundError(kind, toKey)
    if (fromKey === toKey) return 0

    let moved = 0
    for (const type of RELATIONSHIP_TYPES) {
      const endpoints = RELATIONSHIP_ENDPOINTS[type]
      const bucket = this.relationships[type]
      if (endpoints.from === kind) moved += bucket.redirect('from', fromKey, toKey)
      if (endpoints.to === kind) moved += bucket.redirect('to', fromKey, toKey)
    }

    this.nodes[kind].delete(fromKey)
    return moved
  }

  async getRelationship<R extends RelationshipType>(
    id: RelationshipId<R>
  ): Promise<Relationship<R> | null> {
    const relationship = this.bucket(id.type).get(idKey(id))
    return relationship ? structuredClone(relationship) : null
  }

  async createRelationship<R extends RelationshipType>(
    relationship: Relationship<R>
  ): Promise<Relationship<R>> {
    const endpoints = RELATIONSHIP_ENDPOINTS[relationship.type]
    if (!this.hasNode(endpoints.from, relationship.from)) {
      throw new NodeNotFoundError(endpoints.from, relationship.from)
    }
    if (!this.hasNode(endpoints.to, relationship.to)) {
      throw new NodeNotFoundError(endpoints.to, relationship.to)
    }

    const bucket = this.bucket(relationship.type)
    const key = idKey(relationship)
    if (bucket.has(key)) {
      throw new DuplicateNodeError(relationship.type, key)
    }
    bucket.set(structuredClone(relationship))
    return structuredClone(relationship)
  }

  async updateRelationship<R extends RelationshipType>(
    id: RelationshipId<R>,
    changes: Partial<RelationshipTypes[R]['properties']>
  ): Promise<Relationship<R>> {
    const bucket = this.bucket(id.type)
    const key = idKey(id)
    const existing = bucket.get(key)
    if (!existing) {
      throw new NodeNotFoundError(id.type, key)
    }
    const updated: Relationship<R> = {
      ...existing,
      properties: { ...existing.properties, ...structuredClone(changes) },
    }
    bucket.set(updated)
    return structuredClone(updated)
  }

  async deleteRelationship(id: RelationshipId): Promise<boolean> {
    return this.relationships[id.type].remove(idKey(id))
  }

  async relationshipsFrom<R extends RelationshipType>(
    type: R,
    from: string
  ): Promise<Relationship<R>[]> {
    return this.bucket(type).touching('from', from).map((r) => structuredClone(r))
  }

  async relationshipsTo<R extends RelationshipType>(
    type: R,
    to: string
  ): Promise<Relationship<R>[]> {
    return this.bucket(type).touching('to', to).map((r) => structuredClone(r))
  }

  async searchByName<K extends SearchableKind>(kind: K, text: string): Promise<NodeTypes[K][]> {
    const needle = foldName(text)
    if (needle === '') return []
    const results: NodeTypes[K][] = []
    for (const node of this.table(kind).values()) {
      if (foldName(node.name).includes(needle)) {
        results.push(structuredClone(node))
      }
    }
    return results
  }

  async count(kind?: NodeKind): Promise<number> {
    if (kind) return this.nodes[kind].size
    return NODE_KINDS.reduce((total, k) => total + this.nodes[k].size, 0)
  }

  /**
   * Removes every node and relationship
   */
  async clear(): Promise<void> {
    for (const kind of NODE_KINDS) this.nodes[kind].clear()
    for (const type of RELATIONSHIP_TYPES) this.relationships[type].clear()
  }

  private table<K extends NodeKind>(kind: K): Map<string, NodeTypes[K]> {
    return this.nodes[kind]
  }

  private bucket<R extends RelationshipType>(type: R): RelationshipBucket<R> {
    return this.relationships[type]
  }

  private hasNode(kind: NodeKind, key: string): boolean {
    return this.nodes[kind].has(key)
  }
}
