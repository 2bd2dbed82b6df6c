import type { Client } from 'cassandra-driver'
import { errorMessage, log } from '../../plumbing/logger.ts'
import { getDatabaseClient } from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import type { Migration } from './types.ts'

export interface MigrationHistoryRow {
  version: string
  appliedAt: Date | null
  rolledBackAt: Date | null
}

const toDateOrNull = (value: unknown): Date | null =>
  value instanceof Date ? value : null

export const ensureMigrationHistory = async (client: Client): Promise<void> => {
  const { keyspace } = getDatabaseConfig()

  // The history table lives in the keyspace, so the keyspace comes first
  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)

  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.migration_history (
      version TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

export const getMigrationHistory = async (
  client: Client,
): Promise<MigrationHistoryRow[]> => {
  const { keyspace } = getDatabaseConfig()
  const result = await client.execute(
    `SELECT version, applied_at, rolled_back_at FROM ${keyspace}.migration_history`,
  )
  return result.rows.map((row) => ({
    version: String(row.version),
    appliedAt: toDateOrNull(row.applied_at),
    rolledBackAt: toDateOrNull(row.rolled_back_at),
  }))
}

export const getAppliedMigrations = async (
  client: Client,
): Promise<string[]> => {
  // CQL has no IS NULL filter, so rolled back rows are dropped here
  const history = await getMigrationHistory(client)
  return history
    .filter((row) => row.rolledBackAt === null)
    .map((row) => row.version)
}

export const recordMigration = async (
  client: Client,
  migration: Migration,
  action: 'up' | 'down',
): Promise<void> => {
  const { keyspace } = getDatabaseConfig()
  const now = new Date()

  if (action === 'up') {
    await client.execute(
      `INSERT INTO ${keyspace}.migration_history (version, name, description, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?, ?)`,
      [migration.version, migration.name, migration.description, now, null],
    )
    return
  }

  await client.execute(
    `UPDATE ${keyspace}.migration_history
     SET rolled_back_at = ?
     WHERE version = ?`,
    [now, migration.version],
  )
}

const runStep = async (
  client: Client,
  migration: Migration,
  direction: 'up' | 'down',
): Promise<void> => {
  log({
    message: direction === 'up' ? 'Running migration' : 'Rolling back migration',
    version: migration.version,
    name: migration.name,
  })

  try {
    await migration[direction](client)
    await recordMigration(client, migration, direction)
    log({
      message:
        direction === 'up' ? 'Migration completed' : 'Migration rolled back',
      version: migration.version,
    })
  } catch (error) {
    log(
      {
        message:
          direction === 'up' ? 'Migration failed' : 'Migration rollback failed',
        version: migration.version,
        error: errorMessage(error),
      },
      'error',
    )
    throw error
  }
}

/**
 * Apply every pending migration in version order, or roll back the most
 * recently applied one.
 */
export const runMigrations = async (
  migrations: Migration[],
  direction: 'up' | 'down' = 'up',
): Promise<void> => {
  const client = getDatabaseClient()

  await ensureMigrationHistory(client)
  const applied = await getAppliedMigrations(client)

  if (direction === 'up') {
    const pending = migrations
      .filter((m) => !applied.includes(m.version))
      .sort((a, b) => a.version.localeCompare(b.version))

    for (const migration of pending) {
      await runStep(client, migration, 'up')
    }
    return
  }

  const [latest] = migrations
    .filter((m) => applied.includes(m.version))
    .sort((a, b) => b.version.localeCompare(a.version))

  if (!latest) {
    log('No migrations to rollback')
    return
  }

  await runStep(client, latest, 'down')
}
