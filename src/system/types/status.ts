import type { AccountState } from '../../accounts/types/account.ts'
import type { DatabaseHealthStatus } from '../../database/health.ts'

export interface ServiceStatus {
  name: string
  /** systemctl is-active output, or "unknown" when systemctl could not run */
  status: string
  running: boolean
}

export interface HostStatus {
  hostname: string
  uptimeSeconds: number
  loadAverage: number[]
  cpuCount: number
  memory: {
    totalBytes: number
    freeBytes: number
  }
}

export type AccountCounts = Record<Exclude<AccountState, 'deleted'>, number> & {
  total: number
}

export interface SystemStatus {
  checkedAt: string
  host: HostStatus
  services: ServiceStatus[]
  database: DatabaseHealthStatus
  accounts: AccountCounts
}
