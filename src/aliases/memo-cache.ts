/**
 * Unbounded in-memory memo cache for pure lookups
 * @module aliases/memo-cache
 */

/**
 * Cache statistics
 */
export interface MemoCacheStats {
  hits: number
  misses: number
  size: number
}

/**
 * Process-local memo cache. Entries never expire; the cache lives exactly as
 * long as its owner.
 */
export class MemoCache<T extends NonNullable<unknown>> {
  private readonly entries: Map<string, T> = new Map()
  private readonly stats = {
    hits: 0,
    misses: 0,
  }

  /**
   * Returns the cached value for `key`, computing and storing it on a miss.
   * `onMiss` runs only when the value is computed.
   */
  getOrCompute(key: string, compute: (key: string) => T, onMiss?: (value: T) => void): T {
    const cached = this.entries.get(key)
    if (cached !== undefined) {
      this.stats.hits++
      return cached
    }

    this.stats.misses++
    const value = compute(key)
    this.entries.set(key, value)
    onMiss?.(value)
    return value
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  clear(): void {
    this.entries.clear()
    this.stats.hits = 0
    this.stats.misses = 0
  }

  getStats(): MemoCacheStats {
    return {
      hits: this.stats.hits,
      misses: this.stats.misses,
      size: this.entries.size,
    }
  }
}
