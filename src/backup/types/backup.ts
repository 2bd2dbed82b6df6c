import type { ReconcileReport } from '../../lifecycle/types/controller.ts'

export const BACKUP_VERSION = 1

export interface SerializedAccount {
  id: string
  protocol: string
  credential: unknown
  quotaBytes: number | null
  quotaLoginCount: number | null
  usageBytes: number
  usageLoginCount: number
  lastSampleBytes: number
  expiresAt: string | null
  state: string
  lockReason: string | null
  createdAt: string
  lastModifiedAt: string
}

export interface BackupFile {
  version: typeof BACKUP_VERSION
  exportedAt: string
  accounts: SerializedAccount[]
}

export interface BackupSummary {
  file: string
  accounts: number
}

export interface RestoreSummary {
  file: string
  restored: number
  reconcile: ReconcileReport
}
