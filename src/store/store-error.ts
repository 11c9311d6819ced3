/**
 * Store error classes
 * @module store/store-error
 */

import { ScorelineError } from '../utils/errors.js'

/**
 * Base error class for graph store failures
 */
export class StoreError extends ScorelineError {
  constructor(message: string, code = 'STORE_ERROR', context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'StoreError'
  }
}

/**
 * Error thrown when a node or relationship endpoint does not exist
 */
export class NodeNotFoundError extends StoreError {
  public readonly kind: string
  public readonly key: string

  constructor(kind: string, key: string) {
    super(`No ${kind} with key '${key}'`, 'NODE_NOT_FOUND', { kind, key })
    this.name = 'NodeNotFoundError'
    this.kind = kind
    this.key = key
  }
}

/**
 * Error thrown when creating a node or relationship whose key is taken
 */
export class DuplicateNodeError extends StoreError {
  public readonly kind: string
  public readonly key: string

  constructor(kind: string, key: string) {
    super(`A ${kind} with key '${key}' already exists`, 'DUPLICATE_NODE', { kind, key })
    this.name = 'DuplicateNodeError'
    this.kind = kind
    this.key = key
  }
}
