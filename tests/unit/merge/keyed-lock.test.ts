import { describe, it, expect } from 'vitest'
import { KeyedLock } from '../../../src/merge/keyed-lock.js'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

describe('KeyedLock', () => {
  it('runs tasks sharing a key one at a time, in call order', async () => {
    const lock = new KeyedLock()
    const events: string[] = []
    const gate = deferred()

    const first = lock.run(['team:Santos'], async () => {
      events.push('first:start')
      await gate.promise
      events.push('first:end')
    })
    const second = lock.run(['team:Santos'], async () => {
      events.push('second')
    })

    await flush()
    expect(events).toEqual(['first:start'])

    gate.resolve()
    await Promise.all([first, second])

    expect(events).toEqual(['first:start', 'first:end', 'second'])
  })

  it('lets tasks on disjoint keys run concurrently', async () => {
    const lock = new KeyedLock()
    const events: string[] = []
    const gate = deferred()

    const first = lock.run(['team:Santos'], async () => {
      events.push('santos:start')
      await gate.promise
      events.push('santos:end')
    })
    const second = lock.run(['team:Bahia'], async () => {
      events.push('bahia')
    })

    await second
    expect(events).toEqual(['santos:start', 'bahia'])

    gate.resolve()
    await first
  })

  it('does not deadlock on overlapping key sets given in different orders', async () => {
    const lock = new KeyedLock()
    const order: number[] = []

    await Promise.all([
      lock.run(['a', 'b'], async () => {
        order.push(1)
      }),
      lock.run(['b', 'a'], async () => {
        order.push(2)
      }),
      lock.run(['b'], async () => {
        order.push(3)
      }),
    ])

    expect(order).toEqual([1, 2, 3])
  })

  it('releases keys after a failing task', async () => {
    const lock = new KeyedLock()

    await expect(
      lock.run(['k'], async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    await expect(lock.run(['k'], async () => 'next')).resolves.toBe('next')
    expect(lock.pendingKeys).toBe(0)
  })
})
