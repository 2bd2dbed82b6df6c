import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { parseCredential } from '../accounts/storage.ts'
import type { Account, AccountStore, LockReason } from '../accounts/types/account.ts'
import {
  assertValidAccount,
  isAccountState,
  isProtocol,
} from '../accounts/validation.ts'
import type { KeyedMutex } from '../lifecycle/keyed-mutex.ts'
import type { ReconcileReport } from '../lifecycle/types/controller.ts'
import {
  ConflictError,
  hasErrorCode,
  NotFoundError,
  ValidationError,
} from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import {
  BACKUP_VERSION,
  type BackupFile,
  type BackupSummary,
  type RestoreSummary,
  type SerializedAccount,
} from './types/backup.ts'

export const BACKUP_FILE_PATTERN = /^backup_\d{8}_\d{6}\.json$/

export interface BackupDependencies {
  store: AccountStore
  mutex: KeyedMutex
  reconcile: () => Promise<ReconcileReport>
  directory: string
  now?: () => Date
}

export interface BackupService {
  exportBackup(): Promise<BackupSummary>
  /** Newest first */
  listBackups(): Promise<string[]>
  restoreBackup(file: string): Promise<RestoreSummary>
}

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * backup_YYYYMMDD_HHMMSS.json in UTC
 */
export const backupFileName = (date: Date): string => {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  return `backup_${day}_${time}.json`
}

export const serializeAccount = (account: Account): SerializedAccount => ({
  id: account.id,
  protocol: account.protocol,
  credential: account.credential,
  quotaBytes: account.quotaBytes,
  quotaLoginCount: account.quotaLoginCount,
  usageBytes: account.usageBytes,
  usageLoginCount: account.usageLoginCount,
  lastSampleBytes: account.lastSampleBytes,
  expiresAt: account.expiresAt ? account.expiresAt.toISOString() : null,
  state: account.state,
  lockReason: account.lockReason,
  createdAt: account.createdAt.toISOString(),
  lastModifiedAt: account.lastModifiedAt.toISOString(),
})

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const readCount = (
  record: Record<string, unknown>,
  key: string,
  label: string,
): number => {
  const value = record[key]
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${label}: ${key} must be a non-negative integer`)
  }
  return value
}

const readLimit = (
  record: Record<string, unknown>,
  key: string,
  label: string,
): number | null =>
  record[key] === null || record[key] === undefined
    ? null
    : readCount(record, key, label)

const readDate = (
  record: Record<string, unknown>,
  key: string,
  label: string,
): Date => {
  const value = record[key]
  const date = typeof value === 'string' ? new Date(value) : null
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`${label}: ${key} must be an ISO date`)
  }
  return date
}

const readLockReason = (value: unknown, label: string): LockReason | null => {
  if (value === null || value === undefined) return null
  if (value === 'manual' || value === 'quota') return value
  throw new ValidationError(`${label}: invalid lockReason ${String(value)}`)
}

export const deserializeAccount = (raw: unknown, index: number): Account => {
  const label = `Backup entry ${index}`
  if (!isRecord(raw)) {
    throw new ValidationError(`${label} is not an object`)
  }

  const { id, protocol, state } = raw
  if (typeof id !== 'string') {
    throw new ValidationError(`${label}: id must be a string`)
  }
  if (!isProtocol(protocol)) {
    throw new ValidationError(`${label}: invalid protocol ${String(protocol)}`)
  }
  if (!isAccountState(state)) {
    throw new ValidationError(`${label}: invalid state ${String(state)}`)
  }

  const account: Account = {
    id,
    protocol,
    credential: parseCredential(JSON.stringify(raw.credential ?? null)),
    quotaBytes: readLimit(raw, 'quotaBytes', label),
    quotaLoginCount: readLimit(raw, 'quotaLoginCount', label),
    usageBytes: readCount(raw, 'usageBytes', label),
    usageLoginCount: readCount(raw, 'usageLoginCount', label),
    lastSampleBytes: readCount(raw, 'lastSampleBytes', label),
    expiresAt:
      raw.expiresAt === null || raw.expiresAt === undefined
        ? null
        : readDate(raw, 'expiresAt', label),
    state,
    lockReason: state === 'locked' ? readLockReason(raw.lockReason, label) : null,
    createdAt: readDate(raw, 'createdAt', label),
    lastModifiedAt: readDate(raw, 'lastModifiedAt', label),
  }

  assertValidAccount(account)
  return account
}

export const parseBackup = (content: string): Account[] => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ValidationError(`Backup is not valid JSON: ${errorMessage(error)}`)
  }

  if (!isRecord(parsed) || parsed.version !== BACKUP_VERSION) {
    throw new ValidationError(
      `Unsupported backup format: expected version ${BACKUP_VERSION}`,
    )
  }
  if (!Array.isArray(parsed.accounts)) {
    throw new ValidationError('Backup has no accounts list')
  }

  const accounts = parsed.accounts.map(deserializeAccount)
  const ids = new Set<string>()
  for (const account of accounts) {
    if (ids.has(account.id)) {
      throw new ValidationError(`Backup lists ${account.id} twice`)
    }
    ids.add(account.id)
  }
  return accounts
}

/**
 * Opaque JSON export of the account store. Restore only reads files from the
 * backup directory, upserts every record and then reconciles the daemons.
 */
export const createBackupService = (deps: BackupDependencies): BackupService => {
  const { store, mutex, directory } = deps
  const now = deps.now ?? (() => new Date())

  return {
    exportBackup: async () => {
      const exportedAt = now()
      const accounts: SerializedAccount[] = []
      for await (const account of store.list()) {
        accounts.push(serializeAccount(account))
      }

      const backup: BackupFile = {
        version: BACKUP_VERSION,
        exportedAt: exportedAt.toISOString(),
        accounts,
      }

      const file = backupFileName(exportedAt)
      await mkdir(directory, { recursive: true, mode: 0o700 })
      try {
        // Credentials for trojan and l2tp are stored in plaintext
        await writeFile(
          path.join(directory, file),
          `${JSON.stringify(backup, null, 2)}\n`,
          { mode: 0o600, flag: 'wx' },
        )
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) {
          throw new ConflictError(`Backup already exists: ${file}`)
        }
        throw error
      }

      log({ message: 'Backup written', file, accounts: accounts.length })
      return { file, accounts: accounts.length }
    },

    listBackups: async () => {
      try {
        const entries = await readdir(directory)
        return entries
          .filter((entry) => BACKUP_FILE_PATTERN.test(entry))
          .sort()
          .reverse()
      } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) return []
        throw error
      }
    },

    restoreBackup: async (file) => {
      if (!BACKUP_FILE_PATTERN.test(file)) {
        throw new ValidationError(
          'Backup file must be a name like backup_YYYYMMDD_HHMMSS.json',
        )
      }

      let content: string
      try {
        content = await readFile(path.join(directory, file), 'utf8')
      } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
          throw new NotFoundError(`Backup not found: ${file}`)
        }
        throw error
      }

      const accounts = parseBackup(content)
      for (const account of accounts) {
        await mutex.run(account.id, () => store.put(account))
      }
      log({ message: 'Backup restored', file, accounts: accounts.length })

      const reconcile = await deps.reconcile()
      return { file, restored: accounts.length, reconcile }
    },
  }
}
