import { errorMessage } from '../plumbing/logger.ts'
import { getDatabaseClient, isDatabaseEnabledForEnv } from './client.ts'
import { getDatabaseConfig } from './config.ts'

export interface DatabaseHealthStatus {
  isHealthy: boolean
  message: string
  details?: {
    keyspaceExists: boolean
    accountsTableExists: boolean
    hostCount: number
  }
}

export const checkDatabaseHealth = async (): Promise<DatabaseHealthStatus> => {
  if (!isDatabaseEnabledForEnv()) {
    return {
      isHealthy: true,
      message: 'Database disabled for this environment',
    }
  }

  try {
    const client = getDatabaseClient()
    const { keyspace } = getDatabaseConfig()

    await client.execute('SELECT now() FROM system.local')

    const keyspaceResult = await client.execute(
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?',
      [keyspace],
    )
    const tableResult = await client.execute(
      'SELECT table_name FROM system_schema.tables WHERE keyspace_name = ? AND table_name = ?',
      [keyspace, 'accounts'],
    )

    const accountsTableExists = tableResult.rows.length > 0

    return {
      isHealthy: accountsTableExists,
      message: accountsTableExists
        ? 'Database connection is healthy'
        : 'Accounts table missing; run migrations',
      details: {
        keyspaceExists: keyspaceResult.rows.length > 0,
        accountsTableExists,
        hostCount: client.hosts.length,
      },
    }
  } catch (error) {
    return {
      isHealthy: false,
      message: errorMessage(error),
    }
  }
}
