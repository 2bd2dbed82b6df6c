import type { AccountFilter, AccountState, Protocol } from './account.ts'

export interface CreateAccountInput {
  id: string
  protocol: Protocol
  /** ssh, trojan and l2tp; generated when omitted */
  password?: string
  /** vmess and vless; generated when omitted */
  uuid?: string
  /** openvpn; defaults to <certificate dir>/<id>.crt */
  certificatePath?: string
  quotaBytes?: number | null
  quotaLoginCount?: number | null
  expiresAt?: Date | null
}

export interface RenewAccountInput {
  /** Extend by this many days from max(now, current expiry) */
  days?: number
  /** Or set an absolute deadline */
  expiresAt?: Date
  /** Defaults to true */
  resetUsage?: boolean
}

export interface QuotaInput {
  quotaBytes?: number | null
  quotaLoginCount?: number | null
}

export interface ListAccountsInput extends AccountFilter {
  limit?: number
}

export interface AccountView {
  id: string
  protocol: Protocol
  state: AccountState
  lockReason: string | null
  quotaBytes: number | null
  quotaLoginCount: number | null
  usageBytes: number
  usageLoginCount: number
  expiresAt: string | null
  createdAt: string
  lastModifiedAt: string
}

export interface AccountStatusView extends AccountView {
  /** Live session count, null when the daemon could not be asked */
  online: number | null
}

/**
 * Secret material handed back exactly once, at creation or rotation.
 */
export interface IssuedCredential {
  password?: string
  uuid?: string
  certificatePath?: string
}
