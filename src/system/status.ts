import os from 'node:os'
import type { AccountStore } from '../accounts/types/account.ts'
import type { CommandRunner } from '../adapters/types/adapter.ts'
import type { DatabaseHealthStatus } from '../database/health.ts'
import { checkServices } from './service-status.ts'
import type { AccountCounts, HostStatus, SystemStatus } from './types/status.ts'

export interface SystemStatusDependencies {
  store: AccountStore
  run: CommandRunner
  services: string[]
  checkDatabase: () => Promise<DatabaseHealthStatus>
  now?: () => Date
}

export const readHostStatus = (): HostStatus => ({
  hostname: os.hostname(),
  uptimeSeconds: Math.round(os.uptime()),
  loadAverage: os.loadavg(),
  cpuCount: os.cpus().length,
  memory: {
    totalBytes: os.totalmem(),
    freeBytes: os.freemem(),
  },
})

export const countAccounts = async (
  store: AccountStore,
): Promise<AccountCounts> => {
  const counts: AccountCounts = { active: 0, locked: 0, expired: 0, total: 0 }
  for await (const account of store.list()) {
    if (account.state === 'deleted') continue
    counts[account.state] += 1
    counts.total += 1
  }
  return counts
}

/**
 * Daemon liveness, store health and account totals for the status command.
 * Account counts are skipped when the store is unhealthy.
 */
export const createSystemStatus = (deps: SystemStatusDependencies) => {
  const now = deps.now ?? (() => new Date())

  return async (): Promise<SystemStatus> => {
    const [services, database] = await Promise.all([
      checkServices(deps.run, deps.services),
      deps.checkDatabase(),
    ])

    const accounts = database.isHealthy
      ? await countAccounts(deps.store)
      : { active: 0, locked: 0, expired: 0, total: 0 }

    return {
      checkedAt: now().toISOString(),
      host: readHostStatus(),
      services,
      database,
      accounts,
    }
  }
}
