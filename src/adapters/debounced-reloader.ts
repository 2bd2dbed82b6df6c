interface Waiter {
  resolve: () => void
  reject: (error: unknown) => void
}

export interface DebouncedReloader {
  /** Resolves once a flush that started after this call has finished */
  schedule(): Promise<void>
  /** Run any pending flush now (shutdown) */
  flushPending(): Promise<void>
  readonly pending: number
}

/**
 * Batch rapid successive changes into one daemon reload. The window opens at
 * the first request and is not extended by later ones, so a steady stream of
 * changes still reloads every `debounceMs`.
 */
export const createDebouncedReloader = (
  flush: () => Promise<void>,
  debounceMs: number,
): DebouncedReloader => {
  let timer: NodeJS.Timeout | null = null
  let waiters: Waiter[] = []
  let running: Promise<void> = Promise.resolve()

  const fire = (): Promise<void> => {
    if (timer) {
      clearTimeout(timer)
      timer = null
    }
    const batch = waiters
    waiters = []
    if (batch.length === 0) {
      return running
    }

    // Flushes never overlap; each one starts after the previous settled
    running = running.then(async () => {
      try {
        await flush()
        for (const waiter of batch) waiter.resolve()
      } catch (error) {
        for (const waiter of batch) waiter.reject(error)
      }
    })
    return running
  }

  return {
    schedule: () =>
      new Promise<void>((resolve, reject) => {
        waiters.push({ resolve, reject })
        if (!timer) {
          timer = setTimeout(() => {
            timer = null
            void fire()
          }, debounceMs)
        }
      }),
    flushPending: fire,
    get pending() {
      return waiters.length
    },
  }
}
