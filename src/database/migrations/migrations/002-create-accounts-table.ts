import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '002',
  name: 'create_accounts_table',
  description:
    'Create accounts table, the source of truth for every managed protocol account',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${config.keyspace}.accounts (
        account_id TEXT,
        protocol TEXT,
        credential TEXT,
        quota_bytes BIGINT,
        quota_login_count INT,
        usage_bytes BIGINT,
        usage_login_count INT,
        last_sample_bytes BIGINT,
        expires_at TIMESTAMP,
        state TEXT,
        lock_reason TEXT,
        created_at TIMESTAMP,
        updated_at TIMESTAMP,
        PRIMARY KEY (account_id)
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${config.keyspace}.accounts`)
  },
}
