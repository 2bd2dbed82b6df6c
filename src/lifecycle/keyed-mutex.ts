export interface KeyedMutex {
  /** Run `task` once every earlier task for the same key has settled */
  run<T>(key: string, task: () => Promise<T>): Promise<T>
  /** Number of keys with a running or queued task */
  readonly size: number
}

/**
 * Per-key FIFO lock built from promise chains. Keys are dropped from the map
 * as soon as their last task settles, so idle accounts cost nothing.
 */
export const createKeyedMutex = (): KeyedMutex => {
  const tails = new Map<string, Promise<void>>()

  return {
    run: async <T>(key: string, task: () => Promise<T>): Promise<T> => {
      const previous = tails.get(key) ?? Promise.resolve()

      let release: () => void = () => undefined
      const current = new Promise<void>((resolve) => {
        release = resolve
      })
      const tail = previous.then(() => current)
      tails.set(key, tail)

      await previous
      try {
        return await task()
      } finally {
        release()
        if (tails.get(key) === tail) {
          tails.delete(key)
        }
      }
    },

    get size() {
      return tails.size
    },
  }
}
