/**
 * Keyed Mutex
 *
 * Serializes async critical sections per key. Sections for different keys
 * run concurrently; sections for the same key run in call order.
 */

export type KeyedMutex = {
  run<T>(key: string, fn: () => Promise<T> | T): Promise<T>
}

export function createKeyedMutex(): KeyedMutex {
  const tails = new Map<string, Promise<void>>()

  function run<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const prev = tails.get(key) ?? Promise.resolve()
    const result = prev.then(() => fn())
    // The chain continues whether this section fails or not
    const tail = result.then(() => undefined, () => undefined)
    tails.set(key, tail)
    void tail.then(() => {
      if (tails.get(key) === tail) tails.delete(key)
    })
    return result
  }

  return { run }
}
