#!/usr/bin/env tsx
import 'dotenv/config'
import { errorMessage, log } from '../../plumbing/logger.ts'
import { initializeDatabase, shutdownDatabase } from '../client.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'
import { getMigrationStatus } from './status.ts'
import type { Migration } from './types.ts'

const USAGE = [
  'Usage: migrate <up|down|status>',
  '  up     - Create the keyspace, the accounts table and the event table',
  '  down   - Roll back the most recent migration',
  '  status - Show which migrations are applied',
].join('\n')

const printStatus = async (migrations: Migration[]): Promise<void> => {
  const status = await getMigrationStatus(migrations)
  console.table(
    status.map((s) => ({
      version: s.version,
      name: s.name,
      applied: s.applied ? 'yes' : 'no',
      appliedAt: s.appliedAt?.toISOString() ?? '-',
      rolledBackAt: s.rolledBackAt?.toISOString() ?? '-',
    })),
  )
  const pending = status.filter((s) => !s.applied).length
  log({ message: 'Migration status', total: status.length, pending })
}

const COMMANDS = new Map<string, (migrations: Migration[]) => Promise<void>>([
  [
    'up',
    async (migrations) => {
      await runMigrations(migrations, 'up')
      log('Migrations applied')
    },
  ],
  [
    'down',
    async (migrations) => {
      await runMigrations(migrations, 'down')
      log('Migration rolled back')
    },
  ],
  ['status', printStatus],
])

const main = async (): Promise<void> => {
  const run = COMMANDS.get(process.argv[2] ?? '')
  if (!run) {
    console.error(USAGE)
    process.exitCode = 2
    return
  }

  try {
    // The keyspace may not exist yet
    await initializeDatabase({ skipKeyspace: true })
    await run(loadMigrations())
  } catch (error) {
    log({ message: 'Migration error', error: errorMessage(error) }, 'error')
    process.exitCode = 1
  } finally {
    await shutdownDatabase()
  }
}

main().catch((error: unknown) => {
  log({ message: 'Fatal migration error', error: errorMessage(error) }, 'error')
  process.exit(1)
})
