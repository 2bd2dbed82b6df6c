import type { QuotaBreach } from '../quota/types/breach.ts'
import { errorMessage, log } from '../plumbing/logger.ts'

export interface BreachQueue {
  enqueue(breach: QuotaBreach): void
  /** Resolves once every queued breach has been handled */
  onIdle(): Promise<void>
  readonly size: number
}

/**
 * Single consumer for tracker breaches. Breaches for an account that is
 * already waiting replace the waiting one, so a burst becomes one lock.
 */
export const createBreachQueue = (
  handle: (breach: QuotaBreach) => Promise<void>,
): BreachQueue => {
  const pending = new Map<string, QuotaBreach>()
  let draining: Promise<void> | null = null

  const drain = async (): Promise<void> => {
    for (;;) {
      const next = pending.entries().next()
      if (next.done) {
        // Cleared in the same tick as the emptiness check
        draining = null
        return
      }
      const [accountId, breach] = next.value
      pending.delete(accountId)

      try {
        await handle(breach)
      } catch (error) {
        log(
          {
            message: 'Quota breach handling failed',
            account_id: accountId,
            error: errorMessage(error),
          },
          'error',
        )
      }
    }
  }

  const start = (): Promise<void> => {
    if (!draining) {
      draining = drain()
    }
    return draining
  }

  return {
    enqueue: (breach: QuotaBreach) => {
      pending.set(breach.accountId, breach)
      start().catch((error: unknown) => {
        log(
          { message: 'Breach queue stopped', error: errorMessage(error) },
          'error',
        )
      })
    },

    onIdle: async () => {
      while (draining) {
        await draining
      }
    },

    get size() {
      return pending.size
    },
  }
}
