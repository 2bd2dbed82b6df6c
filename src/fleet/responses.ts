/**
 * Shape checks for fleet API responses. Remote servers run the same code,
 * so these check the fields callers read rather than every nested value.
 */

import type {
  AccountStatusView,
  AccountView,
} from '../accounts/types/requests.ts'
import { isAccountState, isProtocol } from '../accounts/validation.ts'
import type {
  BackupSummary,
  RestoreSummary,
} from '../backup/types/backup.ts'
import type {
  BulkLockReport,
  IssuedAccount,
  ReconcileReport,
} from '../lifecycle/types/controller.ts'
import type { SystemStatus } from '../system/types/status.ts'

type Json = Record<string, unknown>

const isRecord = (value: unknown): value is Json =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const isNumberOrNull = (value: unknown): boolean =>
  value === null || typeof value === 'number'

export const isAccountView = (value: unknown): value is AccountView =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  isProtocol(value.protocol) &&
  isAccountState(value.state) &&
  typeof value.usageBytes === 'number' &&
  isNumberOrNull(value.quotaBytes)

export const isAccountStatusView = (
  value: unknown,
): value is AccountStatusView =>
  isAccountView(value) && isRecord(value) && isNumberOrNull(value.online)

export const isIssuedAccount = (value: unknown): value is IssuedAccount =>
  isRecord(value) && isAccountView(value.account) && isRecord(value.credential)

export const isAccountList = (
  value: unknown,
): value is { accounts: AccountView[] } =>
  isRecord(value) &&
  Array.isArray(value.accounts) &&
  value.accounts.every(isAccountView)

const isFailureList = (value: unknown): boolean =>
  Array.isArray(value) &&
  value.every(
    (entry) =>
      isRecord(entry) &&
      typeof entry.id === 'string' &&
      typeof entry.error === 'string',
  )

export const isReconcileReport = (value: unknown): value is ReconcileReport =>
  isRecord(value) &&
  typeof value.applied === 'number' &&
  typeof value.revoked === 'number' &&
  typeof value.pruned === 'number' &&
  isFailureList(value.failed) &&
  typeof value.interrupted === 'boolean'

export const isBulkLockReport = (value: unknown): value is BulkLockReport =>
  isRecord(value) &&
  Array.isArray(value.locked) &&
  value.locked.every((id) => typeof id === 'string') &&
  isFailureList(value.failed) &&
  typeof value.interrupted === 'boolean'

export const isBackupSummary = (value: unknown): value is BackupSummary =>
  isRecord(value) &&
  typeof value.file === 'string' &&
  typeof value.accounts === 'number'

export const isBackupList = (value: unknown): value is { backups: string[] } =>
  isRecord(value) &&
  Array.isArray(value.backups) &&
  value.backups.every((file) => typeof file === 'string')

export const isRestoreSummary = (value: unknown): value is RestoreSummary =>
  isRecord(value) &&
  typeof value.file === 'string' &&
  typeof value.restored === 'number' &&
  isReconcileReport(value.reconcile)

export const isSystemStatus = (value: unknown): value is SystemStatus =>
  isRecord(value) &&
  typeof value.checkedAt === 'string' &&
  Array.isArray(value.services) &&
  isRecord(value.database) &&
  isRecord(value.accounts) &&
  isRecord(value.host)
