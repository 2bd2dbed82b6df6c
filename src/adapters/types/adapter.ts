import type { Account } from '../../accounts/types/account.ts'

export interface UsageSnapshot {
  /** Concurrent sessions right now */
  sessions: number
  /** Raw cumulative byte counter as the daemon reports it; may reset */
  bytes: number
}

export interface ApplySecrets {
  /** Plaintext password, only present at create and rotate time */
  password?: string
}

export interface RevokeOptions {
  /** Kill live sessions instead of only refusing new logins */
  disconnect?: boolean
  /** Remove the daemon-side identity entirely (account deletion) */
  purge?: boolean
}

/**
 * One capability set per protocol variant. Adapters never read the account
 * store; they turn a record into live daemon state and back.
 */
export interface ProtocolAdapter {
  readonly name: string
  /** Add or update one account without restarting the daemon */
  apply(account: Account, secrets?: ApplySecrets): Promise<void>
  /** Idempotent: revoking an absent identity succeeds */
  revoke(id: string, options?: RevokeOptions): Promise<void>
  isOnline(id: string): Promise<UsageSnapshot>
  /**
   * Ids of every identity the adapter keeps on disk, for adapters whose
   * daemon could otherwise keep serving one the store no longer has
   */
  listManaged?(): Promise<string[]>
  /** Flush batched daemon reloads before shutdown */
  close?(): Promise<void>
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface CommandOptions {
  /** Written to the child's stdin */
  input?: string
  timeoutMs?: number
}

/**
 * Runs a daemon control command. Throws AdapterUnavailableError when the
 * binary is missing or the command times out; a non-zero exit is returned.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>
