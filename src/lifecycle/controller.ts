import {
  issueCredential,
  rotateCredential as issueRotatedCredential,
} from '../accounts/credentials.ts'
import {
  type Account,
  type AccountStore,
  type LockReason,
  PROTOCOLS,
} from '../accounts/types/account.ts'
import type {
  AccountStatusView,
  AccountView,
  CreateAccountInput,
  ListAccountsInput,
  QuotaInput,
  RenewAccountInput,
} from '../accounts/types/requests.ts'
import {
  assertValidAccountId,
  assertValidQuota,
  validateCreateInput,
} from '../accounts/validation.ts'
import type { AdapterRegistry } from '../adapters/registry.ts'
import type { ApplySecrets, RevokeOptions } from '../adapters/types/adapter.ts'
import { logAuditEvent } from '../plumbing/audit-log.ts'
import {
  AdapterUnavailableError,
  ConflictError,
  isLifecycleError,
  NotFoundError,
  ValidationError,
} from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import { withTimeout } from '../plumbing/with-timeout.ts'
import { isOverQuota } from '../quota/usage.ts'
import type { QuotaBreach } from '../quota/types/breach.ts'
import { createBreachQueue } from './breach-queue.ts'
import { createKeyedMutex, type KeyedMutex } from './keyed-mutex.ts'
import { isNoop, nextState, stateAfterRenew } from './state-machine.ts'
import type {
  AccountFailure,
  BulkLockReport,
  IssuedAccount,
  LifecycleConfig,
  LifecycleController,
  ReconcileReport,
} from './types/controller.ts'

const DAY_MS = 24 * 60 * 60 * 1000
const MAX_RENEW_DAYS = 3650

export interface LifecycleDependencies {
  store: AccountStore
  adapters: AdapterRegistry
  config: LifecycleConfig
  /** Shared with the quota tracker so usage writes and transitions serialize */
  mutex?: KeyedMutex
  now?: () => Date
}

export const toAccountView = (account: Account): AccountView => ({
  id: account.id,
  protocol: account.protocol,
  state: account.state,
  lockReason: account.lockReason,
  quotaBytes: account.quotaBytes,
  quotaLoginCount: account.quotaLoginCount,
  usageBytes: account.usageBytes,
  usageLoginCount: account.usageLoginCount,
  expiresAt: account.expiresAt ? account.expiresAt.toISOString() : null,
  createdAt: account.createdAt.toISOString(),
  lastModifiedAt: account.lastModifiedAt.toISOString(),
})

/**
 * Owns every account state transition. The daemon is changed first and the
 * store second, so a failing adapter leaves the persisted state untouched.
 */
export const createLifecycleController = (
  deps: LifecycleDependencies,
): LifecycleController => {
  const { store, adapters, config } = deps
  const mutex = deps.mutex ?? createKeyedMutex()
  const now = deps.now ?? (() => new Date())

  const callAdapter = async <T>(
    account: Pick<Account, 'id' | 'protocol'>,
    operation: string,
    task: () => Promise<T>,
  ): Promise<T> => {
    try {
      return await withTimeout(
        task(),
        config.adapterTimeoutMs,
        () =>
          new AdapterUnavailableError(
            `${account.protocol} ${operation} for ${account.id} timed out after ${config.adapterTimeoutMs}ms`,
          ),
      )
    } catch (error) {
      if (isLifecycleError(error)) throw error
      throw new AdapterUnavailableError(
        `${account.protocol} ${operation} for ${account.id} failed: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  const apply = (account: Account, secrets?: ApplySecrets): Promise<void> =>
    callAdapter(account, 'apply', () =>
      adapters[account.protocol].apply(account, secrets),
    )

  const revoke = (account: Account, options: RevokeOptions): Promise<void> =>
    callAdapter(account, 'revoke', () =>
      adapters[account.protocol].revoke(account.id, options),
    )

  /**
   * Apply an update over the record that is live on the daemon now. If the
   * update fails the live record is applied again, since adapters that
   * replace an identity may already have removed the old one.
   */
  const applyUpdate = async (
    current: Account,
    updated: Account,
    secrets?: ApplySecrets,
  ): Promise<void> => {
    try {
      await apply(updated, secrets)
    } catch (error) {
      if (current.state === 'active') {
        try {
          await apply(current)
        } catch (restoreError) {
          log(
            {
              message: 'Failed to restore account on its daemon after update failure',
              account_id: current.id,
              error: errorMessage(restoreError),
            },
            'error',
          )
        }
      }
      throw error
    }
  }

  /**
   * Purge daemon identities that no stored account owns, such as one left
   * behind by a create whose store write was rolled back.
   */
  const pruneOrphans = async (
    owned: Set<string>,
    report: ReconcileReport,
    signal?: AbortSignal,
  ): Promise<void> => {
    for (const protocol of PROTOCOLS) {
      const adapter = adapters[protocol]
      const listManaged = adapter.listManaged?.bind(adapter)
      if (!listManaged) continue

      let managed: string[]
      try {
        managed = await callAdapter({ id: '*', protocol }, 'list', listManaged)
      } catch (error) {
        report.failed.push({ id: protocol, error: errorMessage(error) })
        continue
      }

      for (const id of managed) {
        if (owned.has(`${protocol}:${id}`)) continue
        if (signal?.aborted) {
          report.interrupted = true
          return
        }

        try {
          const pruned = await mutex.run(id, async () => {
            try {
              const account = await store.get(id)
              // created since the walk
              if (account.protocol === protocol) return false
            } catch (error) {
              if (!(error instanceof NotFoundError)) throw error
            }
            await callAdapter({ id, protocol }, 'revoke', () =>
              adapter.revoke(id, { disconnect: true, purge: true }),
            )
            return true
          })
          if (pruned) {
            report.pruned += 1
            log(
              {
                message: 'Removed daemon identity with no account',
                account_id: id,
                protocol,
              },
              'warn',
            )
          }
        } catch (error) {
          report.failed.push({ id, error: errorMessage(error) })
        }
      }
    }
  }

  const recordEvent = async (
    id: string,
    event: string,
    detail: object,
  ): Promise<void> => {
    try {
      await store.recordEvent(id, event, detail)
    } catch (error) {
      log(
        {
          message: 'Failed to record account event',
          account_id: id,
          event,
          error: errorMessage(error),
        },
        'warn',
      )
    }
  }

  const persistTransition = async (
    account: Account,
    updated: Account,
    event: string,
  ): Promise<AccountView> => {
    await store.put(updated)
    logAuditEvent({
      event: 'account_transition',
      account_id: account.id,
      from: account.state,
      to: updated.state,
      ...(updated.lockReason ? { lock_reason: updated.lockReason } : {}),
    })
    await recordEvent(account.id, event, {
      from: account.state,
      to: updated.state,
      lockReason: updated.lockReason,
    })
    return toAccountView(updated)
  }

  const lockAccount = async (
    account: Account,
    reason: LockReason,
    disconnect: boolean,
  ): Promise<AccountView> => {
    if (isNoop(account.state, 'lock')) {
      // A manual lock over a quota lock pins it, so renew will not lift it
      if (reason === 'manual' && account.lockReason !== 'manual') {
        return persistTransition(
          account,
          { ...account, lockReason: 'manual', lastModifiedAt: now() },
          'locked',
        )
      }
      return toAccountView(account)
    }

    const state = nextState(account.state, 'lock')
    await revoke(account, { disconnect })
    return persistTransition(
      account,
      { ...account, state, lockReason: reason, lastModifiedAt: now() },
      'locked',
    )
  }

  /**
   * Lock for quota unless the account moved on since the breach was seen
   * (unlocked, renewed or already locked). Returns whether it locked.
   */
  const lockForQuota = (id: string): Promise<boolean> =>
    mutex.run(id, async () => {
      const account = await store.get(id)
      if (account.state !== 'active' || !isOverQuota(account)) {
        return false
      }
      await lockAccount(account, 'quota', config.breachAction === 'disconnect')
      return true
    })

  const breaches = createBreachQueue(async (breach) => {
    try {
      await lockForQuota(breach.accountId)
    } catch (error) {
      if (error instanceof NotFoundError) return
      throw error
    }
  })

  const resolveExpiry = (account: Account, input: RenewAccountInput): Date => {
    const current = now()
    if (input.expiresAt !== undefined) {
      if (input.expiresAt.getTime() <= current.getTime()) {
        throw new ValidationError('expiresAt must be in the future')
      }
      return input.expiresAt
    }

    const { days } = input
    if (
      days === undefined ||
      !Number.isInteger(days) ||
      days < 1 ||
      days > MAX_RENEW_DAYS
    ) {
      throw new ValidationError(
        `Renew needs expiresAt or a whole number of days between 1 and ${MAX_RENEW_DAYS}`,
      )
    }
    const base = Math.max(current.getTime(), account.expiresAt?.getTime() ?? 0)
    return new Date(base + days * DAY_MS)
  }

  return {
    create: async (input: CreateAccountInput): Promise<IssuedAccount> => {
      validateCreateInput(input, now())

      return mutex.run(input.id, async () => {
        const { credential, issued } = await issueCredential(
          input,
          config.certificateDir,
        )
        const createdAt = now()
        const account: Account = {
          id: input.id,
          protocol: input.protocol,
          credential,
          quotaBytes: input.quotaBytes ?? null,
          quotaLoginCount: input.quotaLoginCount ?? null,
          usageBytes: 0,
          usageLoginCount: 0,
          lastSampleBytes: 0,
          expiresAt: input.expiresAt ?? null,
          state: 'active',
          lockReason: null,
          createdAt,
          lastModifiedAt: createdAt,
        }

        const inserted = await store.insert(account)
        if (!inserted) {
          throw new ConflictError(`Account already exists: ${input.id}`)
        }

        try {
          await apply(
            account,
            issued.password === undefined ? undefined : { password: issued.password },
          )
        } catch (error) {
          try {
            await store.delete(account.id)
          } catch (rollbackError) {
            log(
              {
                message: 'Failed to roll back account after apply failure',
                account_id: account.id,
                error: errorMessage(rollbackError),
              },
              'error',
            )
          }
          throw error
        }

        logAuditEvent({
          event: 'account_created',
          account_id: account.id,
          protocol: account.protocol,
        })
        await recordEvent(account.id, 'created', { protocol: account.protocol })

        return { account: toAccountView(account), credential: issued }
      })
    },

    lock: (id: string) =>
      mutex.run(assertValidAccountId(id), async () =>
        lockAccount(await store.get(id), 'manual', true),
      ),

    unlock: (id: string) =>
      mutex.run(assertValidAccountId(id), async () => {
        const account = await store.get(id)
        const state = nextState(account.state, 'unlock')
        if (isNoop(account.state, 'unlock')) {
          return toAccountView(account)
        }

        await apply(account)
        return persistTransition(
          account,
          { ...account, state, lockReason: null, lastModifiedAt: now() },
          'unlocked',
        )
      }),

    expire: (id: string) =>
      mutex.run(assertValidAccountId(id), async () => {
        const account = await store.get(id)
        const state = nextState(account.state, 'expire')
        if (isNoop(account.state, 'expire')) {
          return toAccountView(account)
        }

        if (account.state === 'active') {
          await revoke(account, { disconnect: true })
        }
        return persistTransition(
          account,
          { ...account, state, lockReason: null, lastModifiedAt: now() },
          'expired',
        )
      }),

    renew: (id: string, input: RenewAccountInput) =>
      mutex.run(assertValidAccountId(id), async () => {
        const account = await store.get(id)
        const expiresAt = resolveExpiry(account, input)
        const state = stateAfterRenew(account)
        const resetUsage = input.resetUsage ?? true

        const updated: Account = {
          ...account,
          expiresAt,
          state,
          lockReason: state === 'locked' ? account.lockReason : null,
          lastModifiedAt: now(),
          ...(resetUsage ? { usageBytes: 0, usageLoginCount: 0 } : {}),
        }

        // Active accounts are re-applied too so the daemon sees the new expiry
        if (state === 'active') {
          await applyUpdate(account, updated)
        }

        await store.put(updated)
        if (account.state !== updated.state) {
          logAuditEvent({
            event: 'account_transition',
            account_id: id,
            from: account.state,
            to: updated.state,
          })
        }
        await recordEvent(id, 'renewed', {
          from: account.state,
          to: updated.state,
          expiresAt: expiresAt.toISOString(),
          resetUsage,
        })
        return toAccountView(updated)
      }),

    delete: (id: string) =>
      mutex.run(assertValidAccountId(id), async () => {
        const account = await store.get(id)
        nextState(account.state, 'delete')

        await revoke(account, { disconnect: true, purge: true })

        await recordEvent(id, 'deleted', {
          ...toAccountView(account),
          state: 'deleted',
        })
        await store.delete(id)
        logAuditEvent({
          event: 'account_deleted',
          account_id: id,
          protocol: account.protocol,
        })
      }),

    list: async (input: ListAccountsInput = {}): Promise<AccountView[]> => {
      const { limit, ...filter } = input
      if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
        throw new ValidationError('limit must be a positive integer')
      }

      const views: AccountView[] = []
      for await (const account of store.list(filter)) {
        views.push(toAccountView(account))
        if (limit !== undefined && views.length >= limit) break
      }
      return views
    },

    status: async (id: string): Promise<AccountStatusView> => {
      const account = await store.get(assertValidAccountId(id))

      let online: number | null = null
      try {
        const usage = await callAdapter(account, 'probe', () =>
          adapters[account.protocol].isOnline(id),
        )
        online = usage.sessions
      } catch (error) {
        log(
          {
            message: 'Live session probe failed',
            account_id: id,
            error: errorMessage(error),
          },
          'warn',
        )
      }

      return { ...toAccountView(account), online }
    },

    setQuota: async (id: string, input: QuotaInput) => {
      assertValidQuota(input.quotaBytes, input.quotaLoginCount)
      if (input.quotaBytes === undefined && input.quotaLoginCount === undefined) {
        throw new ValidationError('Provide quotaBytes and/or quotaLoginCount')
      }

      return mutex.run(assertValidAccountId(id), async () => {
        const account = await store.get(id)
        const updated: Account = {
          ...account,
          quotaBytes:
            input.quotaBytes === undefined ? account.quotaBytes : input.quotaBytes,
          quotaLoginCount:
            input.quotaLoginCount === undefined
              ? account.quotaLoginCount
              : input.quotaLoginCount,
          lastModifiedAt: now(),
        }
        await store.put(updated)
        await recordEvent(id, 'quota_changed', {
          quotaBytes: updated.quotaBytes,
          quotaLoginCount: updated.quotaLoginCount,
        })
        return toAccountView(updated)
      })
    },

    rotateCredential: (id: string) =>
      mutex.run(assertValidAccountId(id), async () => {
        const account = await store.get(id)
        // Applying a password to a system user also unlocks it
        if (account.protocol === 'ssh' && account.state !== 'active') {
          throw new ConflictError(
            `Cannot rotate the password of a ${account.state} SSH account; unlock or renew it first`,
          )
        }

        const { credential, issued } = await issueRotatedCredential(
          id,
          account.protocol,
          config.certificateDir,
        )
        const updated: Account = { ...account, credential, lastModifiedAt: now() }

        if (account.state === 'active') {
          await applyUpdate(
            account,
            updated,
            issued.password === undefined ? undefined : { password: issued.password },
          )
        }

        await store.put(updated)
        logAuditEvent({ event: 'credential_rotated', account_id: id })
        await recordEvent(id, 'credential_rotated', { protocol: account.protocol })
        return { account: toAccountView(updated), credential: issued }
      }),

    reconcile: async (signal?: AbortSignal): Promise<ReconcileReport> => {
      const report: ReconcileReport = {
        applied: 0,
        revoked: 0,
        pruned: 0,
        failed: [],
        interrupted: false,
      }
      const owned = new Set<string>()

      for await (const listed of store.list()) {
        if (signal?.aborted) {
          report.interrupted = true
          break
        }
        owned.add(`${listed.protocol}:${listed.id}`)

        try {
          await mutex.run(listed.id, async () => {
            const account = await store.get(listed.id)
            if (account.state === 'active') {
              await apply(account)
              report.applied += 1
            } else {
              await revoke(account, { disconnect: false })
              report.revoked += 1
            }
          })
        } catch (error) {
          if (error instanceof NotFoundError) continue
          report.failed.push({ id: listed.id, error: errorMessage(error) })
          log(
            {
              message: 'Reconcile failed for account',
              account_id: listed.id,
              error: errorMessage(error),
            },
            'warn',
          )
        }
      }

      if (!report.interrupted) {
        await pruneOrphans(owned, report, signal)
      }

      log({
        message: 'Reconcile finished',
        applied: report.applied,
        revoked: report.revoked,
        pruned: report.pruned,
        failed: report.failed.length,
        interrupted: report.interrupted,
      })
      return report
    },

    lockOverQuota: async (signal?: AbortSignal): Promise<BulkLockReport> => {
      const locked: string[] = []
      const failed: AccountFailure[] = []
      let interrupted = false

      for await (const account of store.list({ state: 'active' })) {
        if (signal?.aborted) {
          interrupted = true
          break
        }
        if (!isOverQuota(account)) continue

        try {
          if (await lockForQuota(account.id)) {
            locked.push(account.id)
          }
        } catch (error) {
          if (error instanceof NotFoundError) continue
          failed.push({ id: account.id, error: errorMessage(error) })
        }
      }

      return { locked, failed, interrupted }
    },

    reportBreach: (breach: QuotaBreach) => {
      logAuditEvent({
        event: 'quota_breach',
        account_id: breach.accountId,
        usage_bytes: breach.usageBytes,
        quota_bytes: breach.quotaBytes,
        usage_login_count: breach.usageLoginCount,
        quota_login_count: breach.quotaLoginCount,
      })
      breaches.enqueue(breach)
    },

    drainBreaches: () => breaches.onIdle(),
  }
}
