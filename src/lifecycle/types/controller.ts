import type {
  AccountView,
  AccountStatusView,
  CreateAccountInput,
  IssuedCredential,
  ListAccountsInput,
  QuotaInput,
  RenewAccountInput,
} from '../../accounts/types/requests.ts'
import type { BreachAction } from '../../adapters/types/adapter-config.ts'
import type { QuotaBreach } from '../../quota/types/breach.ts'

export interface LifecycleConfig {
  adapterTimeoutMs: number
  breachAction: BreachAction
  certificateDir: string
}

export interface IssuedAccount {
  account: AccountView
  /** Secret material; shown once and never stored in plaintext for ssh */
  credential: IssuedCredential
}

export interface AccountFailure {
  id: string
  error: string
}

export interface ReconcileReport {
  applied: number
  revoked: number
  /** Daemon identities removed because no account owns them */
  pruned: number
  failed: AccountFailure[]
  interrupted: boolean
}

export interface BulkLockReport {
  locked: string[]
  failed: AccountFailure[]
  interrupted: boolean
}

export interface LifecycleController {
  create(input: CreateAccountInput): Promise<IssuedAccount>
  lock(id: string): Promise<AccountView>
  unlock(id: string): Promise<AccountView>
  expire(id: string): Promise<AccountView>
  renew(id: string, input: RenewAccountInput): Promise<AccountView>
  delete(id: string): Promise<void>
  list(input?: ListAccountsInput): Promise<AccountView[]>
  status(id: string): Promise<AccountStatusView>
  setQuota(id: string, input: QuotaInput): Promise<AccountView>
  rotateCredential(id: string): Promise<IssuedAccount>
  /** Re-derive daemon state from the store: apply active, revoke the rest */
  reconcile(signal?: AbortSignal): Promise<ReconcileReport>
  /** Lock every active account over quota; stops between accounts on abort */
  lockOverQuota(signal?: AbortSignal): Promise<BulkLockReport>
  /** Queue a tracker breach; breaches for one account coalesce */
  reportBreach(breach: QuotaBreach): void
  /** Resolves once queued breaches are handled */
  drainBreaches(): Promise<void>
}
