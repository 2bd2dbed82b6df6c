export const PROTOCOLS = [
  'ssh',
  'vmess',
  'vless',
  'trojan',
  'openvpn',
  'l2tp',
] as const

export type Protocol = (typeof PROTOCOLS)[number]

export const ACCOUNT_STATES = ['active', 'locked', 'expired', 'deleted'] as const

export type AccountState = (typeof ACCOUNT_STATES)[number]

export type LockReason = 'manual' | 'quota'

export interface PasswordHashCredential {
  kind: 'password-hash'
  hash: string
  salt: string
}

export interface UuidCredential {
  kind: 'uuid'
  uuid: string
}

export interface SecretCredential {
  kind: 'secret'
  secret: string
}

export interface CertificateCredential {
  kind: 'certificate'
  commonName: string
  /** Path of the client certificate issued by the external CA tool */
  certificatePath: string
}

export type Credential =
  | PasswordHashCredential
  | UuidCredential
  | SecretCredential
  | CertificateCredential

export interface Account {
  id: string
  protocol: Protocol
  credential: Credential
  /** null means unlimited */
  quotaBytes: number | null
  quotaLoginCount: number | null
  usageBytes: number
  usageLoginCount: number
  /** Raw daemon counter seen at the previous sample */
  lastSampleBytes: number
  expiresAt: Date | null
  state: AccountState
  lockReason: LockReason | null
  createdAt: Date
  lastModifiedAt: Date
}

export interface AccountFilter {
  protocol?: Protocol
  state?: AccountState
}

/**
 * Durable account records. Daemon configuration is derived from this store,
 * never the other way round.
 */
export interface AccountStore {
  /** Upsert by id */
  put(account: Account): Promise<void>
  /** Insert only when the id is free; false when it already exists */
  insert(account: Account): Promise<boolean>
  /** Throws NotFoundError */
  get(id: string): Promise<Account>
  /** Lazy and restartable: every iteration reads the store again */
  list(filter?: AccountFilter): AsyncIterable<Account>
  /** No error when the account is already gone */
  delete(id: string): Promise<void>
  recordEvent(id: string, event: string, detail: object): Promise<void>
}
