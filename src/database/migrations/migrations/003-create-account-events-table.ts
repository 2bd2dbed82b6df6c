import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '003',
  name: 'create_account_events_table',
  description:
    'Create account_events audit table; deleted accounts keep their final snapshot here',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.account_events (
        account_id TEXT,
        event_id TIMEUUID,
        event TEXT,
        detail TEXT,
        created_at TIMESTAMP,
        PRIMARY KEY (account_id, event_id)
      ) WITH CLUSTERING ORDER BY (event_id DESC)
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(
      `DROP TABLE IF EXISTS ${config.keyspace}.account_events`,
    )
  },
}
