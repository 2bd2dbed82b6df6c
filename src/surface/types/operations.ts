import type {
  AccountStatusView,
  AccountView,
  CreateAccountInput,
  ListAccountsInput,
  QuotaInput,
  RenewAccountInput,
} from '../../accounts/types/requests.ts'
import type {
  BackupSummary,
  RestoreSummary,
} from '../../backup/types/backup.ts'
import type {
  BulkLockReport,
  IssuedAccount,
  ReconcileReport,
} from '../../lifecycle/types/controller.ts'
import type { SystemStatus } from '../../system/types/status.ts'

/**
 * Everything the CLI, the HTTP API and the bot can ask for. Implemented
 * locally over the controller and remotely over a fleet server's API, so
 * every surface can target either.
 */
export interface SurfaceOperations {
  create(input: CreateAccountInput): Promise<IssuedAccount>
  delete(id: string): Promise<void>
  lock(id: string): Promise<AccountView>
  unlock(id: string): Promise<AccountView>
  renew(id: string, input: RenewAccountInput): Promise<AccountView>
  setQuota(id: string, input: QuotaInput): Promise<AccountView>
  rotateCredential(id: string): Promise<IssuedAccount>
  status(id: string): Promise<AccountStatusView>
  list(input?: ListAccountsInput): Promise<AccountView[]>
  lockOverQuota(signal?: AbortSignal): Promise<BulkLockReport>
  reconcile(signal?: AbortSignal): Promise<ReconcileReport>
  backup(): Promise<BackupSummary>
  listBackups(): Promise<string[]>
  restore(file: string): Promise<RestoreSummary>
  systemStatus(): Promise<SystemStatus>
}
