/**
 * Graph store contract: six node kinds, seven relationship kinds
 * @module store/graph-store
 */

import type {
  NodeAttributes,
  NodeKind,
  NodeTypes,
  Relationship,
  RelationshipType,
  RelationshipTypes,
} from '../types/model.js'

/**
 * Node kinds that support lookup by name
 */
export type SearchableKind = 'team' | 'player' | 'stadium'

/**
 * Identifies one relationship: type, both endpoint keys and the optional
 * discriminating attribute
 */
export interface RelationshipId<R extends RelationshipType = RelationshipType> {
  type: R
  from: string
  to: string
  discriminator?: string
}

/**
 * Storage backend for the unified football graph.
 *
 * Nodes are unique per kind and identity key. Relationships are unique per
 * type, endpoints and discriminator. Values returned are copies; mutating
 * them does not affect the store.
 *
 * Implementations can use any adjacency-indexed structure.
 */
export interface GraphStore {
  /**
   * @returns The node, or null if no node of that kind has the key
   */
  getNode<K extends NodeKind>(kind: K, key: string): Promise<NodeTypes[K] | null>

  /**
   * Stores a new node under its `key`.
   *
   * @throws {DuplicateNodeError} If the key is taken
   */
  createNode<K extends NodeKind>(kind: K, node: NodeTypes[K]): Promise<NodeTypes[K]>

  /**
   * Applies attribute changes to an existing node. The node's `key` and
   * `createdAt` never change.
   *
   * @throws {NodeNotFoundError} If the node does not exist
   */
  updateNode<K extends NodeKind>(
    kind: K,
    key: string,
    changes: Partial<NodeTypes[K]>
  ): Promise<NodeTypes[K]>

  /**
   * Lists nodes of a kind whose attributes equal every filter value, in
   * insertion order.
   */
  findNodes<K extends NodeKind>(
    kind: K,
    filter?: Partial<NodeAttributes<K>>
  ): Promise<NodeTypes[K][]>

  /**
   * Deletes a node and every relationship touching it.
   *
   * @returns True if deleted, false if not found
   */
  deleteNode(kind: NodeKind, key: string): Promise<boolean>

  /**
   * Moves every relationship of `fromKey` onto `toKey`, drops the ones that
   * already exist there, then deletes `fromKey`.
   *
   * @returns Number of relationships moved
   * @throws {NodeNotFoundError} If either node does not exist
   */
  redirectNode(kind: NodeKind, fromKey: string, toKey: string): Promise<number>

  getRelationship<R extends RelationshipType>(
    id: RelationshipId<R>
  ): Promise<Relationship<R> | null>

  /**
   * @throws {NodeNotFoundError} If an endpoint does not exist
   * @throws {DuplicateNodeError} If the relationship exists
   */
  createRelationship<R extends RelationshipType>(
    relationship: Relationship<R>
  ): Promise<Relationship<R>>

  /**
   * @throws {NodeNotFoundError} If the relationship does not exist
   */
  updateRelationship<R extends RelationshipType>(
    id: RelationshipId<R>,
    changes: Partial<RelationshipTypes[R]['properties']>
  ): Promise<Relationship<R>>

  deleteRelationship(id: RelationshipId): Promise<boolean>

  relationshipsFrom<R extends RelationshipType>(
    type: R,
    from: string
  ): Promise<Relationship<R>[]>

  relationshipsTo<R extends RelationshipType>(type: R, to: string): Promise<Relationship<R>[]>

  /**
   * Case- and diacritic-insensitive substring search on node names.
   */
  searchByName<K extends SearchableKind>(kind: K, text: string): Promise<NodeTypes[K][]>

  /**
   * Counts nodes of one kind, or of every kind when omitted
   */
  count(kind?: NodeKind): Promise<number>
}
