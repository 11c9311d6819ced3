/**
 * Per-key serialization of asynchronous work
 * @module merge/keyed-lock
 */

/**
 * Serializes tasks that share a key while letting tasks on disjoint keys run
 * concurrently.
 *
 * A task waits for every earlier task holding any of its keys. Waiting is
 * FIFO per key: tasks touching the same key run in the order `run` was
 * called. All keys of a task are queued in one synchronous step, so two tasks
 * can never wait on each other.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock()
 * await Promise.all([
 *   lock.run(['team|Santos', 'match|1'], () => mergeFirst()),
 *   lock.run(['team|Santos'], () => mergeSecond()), // starts after mergeFirst
 *   lock.run(['team|Bahia'], () => mergeThird()),   // runs concurrently
 * ])
 * ```
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>()

  async run<T>(keys: readonly string[], task: () => Promise<T>): Promise<T> {
    const ordered = [...new Set(keys)].sort()

    let release: () => void = () => {}
    const done = new Promise<void>((resolve) => {
      release = resolve
    })

    const waits: Promise<void>[] = []
    const held: Array<[string, Promise<void>]> = []
    for (const key of ordered) {
      const previous = this.tails.get(key)
      if (previous) waits.push(previous)
      const tail = previous ? previous.then(() => done) : done
      this.tails.set(key, tail)
      held.push([key, tail])
    }

    try {
      await Promise.all(waits)
      return await task()
    } finally {
      release()
      for (const [key, tail] of held) {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key)
        }
      }
    }
  }

  /**
   * Number of keys with queued or running work
   */
  get pendingKeys(): number {
    return this.tails.size
  }
}
