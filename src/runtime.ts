import { cassandraAccountStore } from './accounts/storage.ts'
import { createCommandRunner } from './adapters/command-runner.ts'
import { getAdapterConfig } from './adapters/config.ts'
import { closeAdapters, createAdapters } from './adapters/registry.ts'
import { getBackupConfig } from './backup/config.ts'
import { createBackupService } from './backup/service.ts'
import { initializeDatabase, shutdownDatabase } from './database/client.ts'
import { checkDatabaseHealth } from './database/health.ts'
import { createLifecycleController } from './lifecycle/controller.ts'
import { createKeyedMutex } from './lifecycle/keyed-mutex.ts'
import type { LifecycleController } from './lifecycle/types/controller.ts'
import { getTrackerConfig } from './quota/config.ts'
import { createQuotaTracker, type QuotaTracker } from './quota/tracker.ts'
import { createLocalOperations } from './surface/operations.ts'
import type { SurfaceOperations } from './surface/types/operations.ts'
import { getSystemConfig } from './system/config.ts'
import { createSystemStatus } from './system/status.ts'

export interface Runtime {
  controller: LifecycleController
  tracker: QuotaTracker
  operations: SurfaceOperations
  /** Stop the tracker, finish queued breaches, flush reloads, disconnect */
  close(): Promise<void>
}

/**
 * Wire the store, adapters, controller and tracker for this host. Throws when
 * the store cannot be reached; callers treat that as fatal.
 */
export const createRuntime = async (): Promise<Runtime> => {
  await initializeDatabase()

  const adapterConfig = getAdapterConfig()
  const run = createCommandRunner(adapterConfig.timeoutMs)
  const adapters = createAdapters(adapterConfig, run)
  const store = cassandraAccountStore
  const mutex = createKeyedMutex()

  const controller = createLifecycleController({
    store,
    adapters,
    mutex,
    config: {
      adapterTimeoutMs: adapterConfig.timeoutMs,
      breachAction: adapterConfig.breachAction,
      certificateDir: adapterConfig.openvpn.certificateDir,
    },
  })

  const tracker = createQuotaTracker({
    store,
    adapters,
    mutex,
    intervalMs: getTrackerConfig().intervalMs,
    probeTimeoutMs: adapterConfig.timeoutMs,
    reportBreach: controller.reportBreach,
    expire: controller.expire,
  })

  const backup = createBackupService({
    store,
    mutex,
    reconcile: () => controller.reconcile(),
    directory: getBackupConfig().directory,
  })

  const systemStatus = createSystemStatus({
    store,
    run,
    services: getSystemConfig().monitoredServices,
    checkDatabase: checkDatabaseHealth,
  })

  return {
    controller,
    tracker,
    operations: createLocalOperations({ controller, backup, systemStatus }),
    close: async () => {
      await tracker.stop()
      await controller.drainBreaches()
      await closeAdapters(adapters)
      await shutdownDatabase()
    },
  }
}
