import type { Client } from 'cassandra-driver'
import { getDatabaseClient } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import { NotFoundError, ValidationError } from '../plumbing/errors.ts'
import type {
  Account,
  AccountFilter,
  AccountStore,
  Credential,
  LockReason,
} from './types/account.ts'
import {
  assertValidAccount,
  assertValidAccountId,
  isAccountState,
  isProtocol,
} from './validation.ts'

const getClient = (): Client => {
  return getDatabaseClient()
}

const getKeyspace = (): string => {
  return getDatabaseConfig().keyspace
}

const ACCOUNT_COLUMNS =
  'account_id, protocol, credential, quota_bytes, quota_login_count, usage_bytes, usage_login_count, last_sample_bytes, expires_at, state, lock_reason, created_at, updated_at'

/**
 * BIGINT columns come back as driver Long objects.
 */
const toNumber = (value: unknown): number => {
  if (typeof value === 'number') return value
  if (
    typeof value === 'object' &&
    value !== null &&
    'toNumber' in value &&
    typeof value.toNumber === 'function'
  ) {
    const n: unknown = value.toNumber()
    return typeof n === 'number' && Number.isFinite(n) ? n : 0
  }
  return 0
}

const toNumberOrNull = (value: unknown): number | null =>
  value === null || value === undefined ? null : toNumber(value)

const toDateOrNull = (value: unknown): Date | null =>
  value instanceof Date ? value : null

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

export const parseCredential = (raw: unknown): Credential => {
  const parsed: unknown = typeof raw === 'string' ? JSON.parse(raw) : null
  if (!isRecord(parsed)) {
    throw new ValidationError('Stored credential is not an object')
  }

  const str = (key: string): string => {
    const value = parsed[key]
    if (typeof value !== 'string') {
      throw new ValidationError(`Stored credential is missing ${key}`)
    }
    return value
  }

  switch (parsed.kind) {
    case 'password-hash':
      return { kind: 'password-hash', hash: str('hash'), salt: str('salt') }
    case 'uuid':
      return { kind: 'uuid', uuid: str('uuid') }
    case 'secret':
      return { kind: 'secret', secret: str('secret') }
    case 'certificate':
      return {
        kind: 'certificate',
        commonName: str('commonName'),
        certificatePath: str('certificatePath'),
      }
    default:
      throw new ValidationError(
        `Unknown credential kind: ${String(parsed.kind)}`,
      )
  }
}

const parseLockReason = (value: unknown): LockReason | null =>
  value === 'manual' || value === 'quota' ? value : null

export const mapRowToAccount = (row: Record<string, unknown>): Account => {
  const { protocol, state } = row
  if (!isProtocol(protocol) || !isAccountState(state)) {
    throw new ValidationError(
      `Corrupt account row: ${String(row.account_id)}`,
    )
  }

  const createdAt = toDateOrNull(row.created_at) ?? new Date(0)

  return {
    id: String(row.account_id),
    protocol,
    credential: parseCredential(row.credential),
    quotaBytes: toNumberOrNull(row.quota_bytes),
    quotaLoginCount: toNumberOrNull(row.quota_login_count),
    usageBytes: toNumber(row.usage_bytes),
    usageLoginCount: toNumber(row.usage_login_count),
    lastSampleBytes: toNumber(row.last_sample_bytes),
    expiresAt: toDateOrNull(row.expires_at),
    state,
    lockReason: parseLockReason(row.lock_reason),
    createdAt,
    lastModifiedAt: toDateOrNull(row.updated_at) ?? createdAt,
  }
}

const toParams = (account: Account): unknown[] => [
  account.id,
  account.protocol,
  JSON.stringify(account.credential),
  account.quotaBytes,
  account.quotaLoginCount,
  account.usageBytes,
  account.usageLoginCount,
  account.lastSampleBytes,
  account.expiresAt,
  account.state,
  account.lockReason,
  account.createdAt,
  account.lastModifiedAt,
]

/**
 * Upsert an account. CQL INSERT overwrites every column of an existing row.
 */
export const putAccount = async (account: Account): Promise<void> => {
  assertValidAccount(account)

  await getClient().execute(
    `INSERT INTO ${getKeyspace()}.accounts (${ACCOUNT_COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    toParams(account),
    { prepare: true },
  )
}

/**
 * Lightweight transaction so two concurrent creates of one id cannot both win.
 */
export const insertAccount = async (account: Account): Promise<boolean> => {
  assertValidAccount(account)

  const result = await getClient().execute(
    `INSERT INTO ${getKeyspace()}.accounts (${ACCOUNT_COLUMNS})
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     IF NOT EXISTS`,
    toParams(account),
    { prepare: true },
  )

  return result.wasApplied()
}

export const getAccount = async (id: string): Promise<Account> => {
  assertValidAccountId(id)

  const result = await getClient().execute(
    `SELECT ${ACCOUNT_COLUMNS} FROM ${getKeyspace()}.accounts WHERE account_id = ?`,
    [id],
    { prepare: true },
  )

  const [row] = result.rows
  if (!row) {
    throw new NotFoundError(`Account not found: ${id}`)
  }

  const account = mapRowToAccount(row)
  if (account.state === 'deleted') {
    throw new NotFoundError(`Account not found: ${id}`)
  }
  return account
}

const matchesFilter = (account: Account, filter: AccountFilter): boolean =>
  (filter.protocol === undefined || account.protocol === filter.protocol) &&
  (filter.state === undefined || account.state === filter.state)

/**
 * Page through the accounts table. The table is partitioned by id, so the
 * protocol/state filter is applied here rather than with ALLOW FILTERING.
 */
export const listAccounts = (
  filter: AccountFilter = {},
): AsyncIterable<Account> => ({
  async *[Symbol.asyncIterator]() {
    const client = getClient()
    const { keyspace, fetchSize } = getDatabaseConfig()
    let pageState: string | undefined

    do {
      const result = await client.execute(
        `SELECT ${ACCOUNT_COLUMNS} FROM ${keyspace}.accounts`,
        [],
        { prepare: true, fetchSize, pageState },
      )

      for (const row of result.rows) {
        const account = mapRowToAccount(row)
        if (account.state !== 'deleted' && matchesFilter(account, filter)) {
          yield account
        }
      }

      pageState = result.pageState ?? undefined
    } while (pageState)
  },
})

export const deleteAccount = async (id: string): Promise<void> => {
  assertValidAccountId(id)

  await getClient().execute(
    `DELETE FROM ${getKeyspace()}.accounts WHERE account_id = ?`,
    [id],
    { prepare: true },
  )
}

export const recordAccountEvent = async (
  id: string,
  event: string,
  detail: object,
): Promise<void> => {
  await getClient().execute(
    `INSERT INTO ${getKeyspace()}.account_events (account_id, event_id, event, detail, created_at)
     VALUES (?, now(), ?, ?, ?)`,
    [id, event, JSON.stringify(detail), new Date()],
    { prepare: true },
  )
}

export const cassandraAccountStore: AccountStore = {
  put: putAccount,
  insert: insertAccount,
  get: getAccount,
  list: listAccounts,
  delete: deleteAccount,
  recordEvent: recordAccountEvent,
}
