import type { Account } from '../accounts/types/account.ts'
import type { UsageSnapshot } from '../adapters/types/adapter.ts'
import type { QuotaBreach } from './types/breach.ts'

export interface UsageUpdate {
  usageBytes: number
  usageLoginCount: number
  lastSampleBytes: number
}

/**
 * Fold one raw sample into the account's counters. A raw byte counter lower
 * than the previous sample means the daemon restarted, so the new value is
 * traffic since the restart and is added whole.
 */
export const accumulateUsage = (
  account: Pick<Account, 'usageBytes' | 'lastSampleBytes'>,
  sample: UsageSnapshot,
): UsageUpdate => {
  const raw = Math.max(0, sample.bytes)
  const delta =
    raw >= account.lastSampleBytes ? raw - account.lastSampleBytes : raw

  return {
    usageBytes: account.usageBytes + delta,
    usageLoginCount: Math.max(0, sample.sessions),
    lastSampleBytes: raw,
  }
}

export const isOverQuota = (
  account: Pick<
    Account,
    'usageBytes' | 'quotaBytes' | 'usageLoginCount' | 'quotaLoginCount'
  >,
): boolean =>
  (account.quotaBytes !== null && account.usageBytes > account.quotaBytes) ||
  (account.quotaLoginCount !== null &&
    account.usageLoginCount > account.quotaLoginCount)

export const isPastExpiry = (
  account: Pick<Account, 'expiresAt'>,
  now: Date,
): boolean =>
  account.expiresAt !== null && account.expiresAt.getTime() <= now.getTime()

export const toBreach = (account: Account, detectedAt: Date): QuotaBreach => ({
  accountId: account.id,
  usageBytes: account.usageBytes,
  quotaBytes: account.quotaBytes,
  usageLoginCount: account.usageLoginCount,
  quotaLoginCount: account.quotaLoginCount,
  detectedAt,
})
