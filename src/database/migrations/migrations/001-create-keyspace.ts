import type { Client } from 'cassandra-driver'
import { parseNumber } from '../../../plumbing/parse-env.ts'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '001',
  name: 'create_keyspace',
  description: 'Create the account store keyspace',
  up: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    const replicationFactor = parseNumber(
      process.env.SCYLLA_REPLICATION_FACTOR,
      1,
    )
    await client.execute(`
      CREATE KEYSPACE IF NOT EXISTS ${config.keyspace}
      WITH REPLICATION = {
        'class': 'SimpleStrategy',
        'replication_factor': ${Math.max(1, Math.floor(replicationFactor))}
      }
    `)
  },
  down: async (client: Client): Promise<void> => {
    const config = getDatabaseConfig()
    await client.execute(`DROP KEYSPACE IF EXISTS ${config.keyspace}`)
  },
}
