import type { Account, AccountState } from '../accounts/types/account.ts'
import { ConflictError } from '../plumbing/errors.ts'

export type LifecycleAction = 'lock' | 'unlock' | 'expire' | 'renew' | 'delete'

const TRANSITIONS: Record<
  AccountState,
  Partial<Record<LifecycleAction, AccountState>>
> = {
  active: {
    lock: 'locked',
    unlock: 'active',
    expire: 'expired',
    renew: 'active',
    delete: 'deleted',
  },
  locked: {
    lock: 'locked',
    unlock: 'active',
    expire: 'expired',
    renew: 'active',
    delete: 'deleted',
  },
  expired: {
    expire: 'expired',
    renew: 'active',
    delete: 'deleted',
  },
  deleted: {},
}

/**
 * Target state of `action`, or ConflictError when the lifecycle forbids it
 * (an expired account only comes back through renew; deleted is terminal).
 */
export const nextState = (
  from: AccountState,
  action: LifecycleAction,
): AccountState => {
  const to = TRANSITIONS[from][action]
  if (!to) {
    const hint = from === 'expired' ? '; renew it instead' : ''
    throw new ConflictError(`Cannot ${action} an account that is ${from}${hint}`)
  }
  return to
}

/** True when `action` leaves the account where it already is */
export const isNoop = (from: AccountState, action: LifecycleAction): boolean =>
  action !== 'renew' && nextState(from, action) === from

/**
 * Renew brings expired and quota-locked accounts back; a manual lock is an
 * operator decision and survives renewal.
 */
export const stateAfterRenew = (
  account: Pick<Account, 'state' | 'lockReason'>,
): AccountState => {
  if (account.state === 'locked' && account.lockReason === 'manual') {
    return 'locked'
  }
  return nextState(account.state, 'renew')
}
