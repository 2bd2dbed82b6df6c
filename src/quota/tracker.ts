import type { Account, AccountStore } from '../accounts/types/account.ts'
import type { AdapterRegistry } from '../adapters/registry.ts'
import type { UsageSnapshot } from '../adapters/types/adapter.ts'
import type { KeyedMutex } from '../lifecycle/keyed-mutex.ts'
import { AdapterUnavailableError, NotFoundError } from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import { withTimeout } from '../plumbing/with-timeout.ts'
import type { QuotaBreach } from './types/breach.ts'
import { accumulateUsage, isOverQuota, isPastExpiry, toBreach } from './usage.ts'

export interface TrackerDependencies {
  store: AccountStore
  adapters: AdapterRegistry
  mutex: KeyedMutex
  intervalMs: number
  probeTimeoutMs: number
  reportBreach: (breach: QuotaBreach) => void
  expire: (id: string) => Promise<unknown>
  now?: () => Date
}

export interface CycleSummary {
  sampled: number
  breaches: number
  expired: number
  failures: number
}

export interface QuotaTracker {
  start(): void
  /** Stops the timer and waits for a running cycle */
  stop(): Promise<void>
  /** Run one cycle now; joins the running cycle instead of overlapping it */
  runCycle(): Promise<CycleSummary>
  readonly isRunning: boolean
}

export const createQuotaTracker = (deps: TrackerDependencies): QuotaTracker => {
  const { store, adapters, mutex } = deps
  const now = deps.now ?? (() => new Date())
  let timer: NodeJS.Timeout | null = null
  let current: Promise<CycleSummary> | null = null

  const probe = (account: Account): Promise<UsageSnapshot> =>
    withTimeout(
      adapters[account.protocol].isOnline(account.id),
      deps.probeTimeoutMs,
      () =>
        new AdapterUnavailableError(
          `${account.protocol} probe for ${account.id} timed out after ${deps.probeTimeoutMs}ms`,
        ),
    )

  /**
   * Write the sample under the account lock, re-reading the record so a
   * transition or renewal that happened during the probe is not overwritten.
   */
  const recordSample = (
    id: string,
    sample: UsageSnapshot,
  ): Promise<Account | null> =>
    mutex.run(id, async () => {
      const fresh = await store.get(id)
      if (fresh.state !== 'active') {
        return null
      }
      const updated: Account = { ...fresh, ...accumulateUsage(fresh, sample) }
      await store.put(updated)
      return updated
    })

  const trackAccount = async (
    account: Account,
    summary: CycleSummary,
  ): Promise<void> => {
    const at = now()

    if (
      (account.state === 'active' || account.state === 'locked') &&
      isPastExpiry(account, at)
    ) {
      await deps.expire(account.id)
      summary.expired += 1
      return
    }

    if (account.state !== 'active') {
      return
    }

    const sample = await probe(account)
    const updated = await recordSample(account.id, sample)
    summary.sampled += 1

    if (updated && isOverQuota(updated)) {
      summary.breaches += 1
      deps.reportBreach(toBreach(updated, at))
    }
  }

  const cycle = async (): Promise<CycleSummary> => {
    const summary: CycleSummary = {
      sampled: 0,
      breaches: 0,
      expired: 0,
      failures: 0,
    }

    for await (const account of store.list()) {
      try {
        await trackAccount(account, summary)
      } catch (error) {
        if (error instanceof NotFoundError) continue
        summary.failures += 1
        log(
          {
            message: 'Usage sample failed',
            account_id: account.id,
            protocol: account.protocol,
            error: errorMessage(error),
          },
          'warn',
        )
      }
    }

    return summary
  }

  const runCycle = (): Promise<CycleSummary> => {
    if (!current) {
      current = cycle().finally(() => {
        current = null
      })
    }
    return current
  }

  const tick = () => {
    runCycle()
      .then((summary) => {
        if (summary.breaches > 0 || summary.expired > 0 || summary.failures > 0) {
          log({ message: 'Quota tracker cycle finished', ...summary })
        }
      })
      .catch((error: unknown) => {
        log(
          { message: 'Quota tracker cycle failed', error: errorMessage(error) },
          'error',
        )
      })
  }

  return {
    start: () => {
      if (timer) return
      timer = setInterval(tick, deps.intervalMs)
      log({ message: 'Quota tracker started', interval_ms: deps.intervalMs })
    },

    stop: async () => {
      if (timer) {
        clearInterval(timer)
        timer = null
      }
      // A failed cycle has already been logged by tick
      if (current) {
        await Promise.allSettled([current])
      }
    },

    runCycle,

    get isRunning() {
      return timer !== null
    },
  }
}
