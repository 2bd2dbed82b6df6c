export interface BackupConfig {
  directory: string
}

export const getBackupConfig = (): BackupConfig => ({
  directory: process.env.BACKUP_DIR || '/var/backups/tunnel-accounts',
})
