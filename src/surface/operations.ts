import type { BackupService } from '../backup/service.ts'
import type { LifecycleController } from '../lifecycle/types/controller.ts'
import type { SystemStatus } from '../system/types/status.ts'
import type { SurfaceOperations } from './types/operations.ts'

export interface LocalOperationsDependencies {
  controller: LifecycleController
  backup: BackupService
  systemStatus: () => Promise<SystemStatus>
}

export const createLocalOperations = ({
  controller,
  backup,
  systemStatus,
}: LocalOperationsDependencies): SurfaceOperations => ({
  create: (input) => controller.create(input),
  delete: (id) => controller.delete(id),
  lock: (id) => controller.lock(id),
  unlock: (id) => controller.unlock(id),
  renew: (id, input) => controller.renew(id, input),
  setQuota: (id, input) => controller.setQuota(id, input),
  rotateCredential: (id) => controller.rotateCredential(id),
  status: (id) => controller.status(id),
  list: (input) => controller.list(input),
  lockOverQuota: (signal) => controller.lockOverQuota(signal),
  reconcile: (signal) => controller.reconcile(signal),
  backup: () => backup.exportBackup(),
  listBackups: () => backup.listBackups(),
  restore: (file) => backup.restoreBackup(file),
  systemStatus,
})
