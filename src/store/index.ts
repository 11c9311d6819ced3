export type { GraphStore, RelationshipId, SearchableKind } from './graph-store.js'
export { InMemoryGraphStore } from './in-memory-graph-store.js'
export { StoreError, NodeNotFoundError, DuplicateNodeError } from './store-error.js'
