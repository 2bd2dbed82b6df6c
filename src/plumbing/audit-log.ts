/**
 * Audit logging for account lifecycle events.
 * Never logs passwords, UUIDs, CHAP secrets or API tokens.
 */

import type { AccountState, LockReason, Protocol } from '../accounts/types/account.ts'
import { log } from './logger.ts'

export interface AccountCreatedEvent {
  event: 'account_created'
  account_id: string
  protocol: Protocol
}

export interface AccountTransitionEvent {
  event: 'account_transition'
  account_id: string
  from: AccountState
  to: AccountState
  lock_reason?: LockReason
}

export interface AccountDeletedEvent {
  event: 'account_deleted'
  account_id: string
  protocol: Protocol
}

export interface QuotaBreachEvent {
  event: 'quota_breach'
  account_id: string
  usage_bytes: number
  quota_bytes: number | null
  usage_login_count: number
  quota_login_count: number | null
}

export interface CredentialRotatedEvent {
  event: 'credential_rotated'
  account_id: string
}

export interface SurfaceAuthFailureEvent {
  event: 'surface_auth_failure'
  surface: 'api' | 'bot'
  reason: string
}

export type AuditEvent =
  | AccountCreatedEvent
  | AccountTransitionEvent
  | AccountDeletedEvent
  | QuotaBreachEvent
  | CredentialRotatedEvent
  | SurfaceAuthFailureEvent

export const logAuditEvent = (event: AuditEvent): void => {
  log({
    message: 'Audit event',
    audit_event: event,
  })
}
