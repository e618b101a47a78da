/**
 * Store Gate
 *
 * Serializes transactions on a single store connection. Each transaction
 * body gets its own begin/commit; calls made from inside the running body
 * join it, every other call waits until it has committed or rolled back.
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { createKeyedMutex } from './keyed-mutex'

export type TransactionHooks = {
  begin(): void
  commit(): void
  rollback(): void
}

export type StoreGate = {
  transaction<T>(fn: () => Promise<T>): Promise<T>
  /** Runs a single store call outside any other caller's open transaction */
  run<T>(fn: () => Promise<T> | T): Promise<T>
}

const GATE_KEY = 'store'

export function createStoreGate(hooks: TransactionHooks): StoreGate {
  const lock = createKeyedMutex()
  const scope = new AsyncLocalStorage<symbol>()
  let active: symbol | null = null

  function insideActive(): boolean {
    const current = scope.getStore()
    return current !== undefined && current === active
  }

  async function run<T>(fn: () => Promise<T> | T): Promise<T> {
    if (insideActive()) return fn()
    return lock.run(GATE_KEY, fn)
  }

  async function transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (insideActive()) return fn()
    return lock.run(GATE_KEY, () => {
      const token = Symbol('transaction')
      return scope.run(token, async () => {
        active = token
        hooks.begin()
        try {
          const result = await fn()
          hooks.commit()
          return result
        } catch (e) {
          hooks.rollback()
          throw e
        } finally {
          active = null
        }
      })
    })
  }

  return { transaction, run }
}
