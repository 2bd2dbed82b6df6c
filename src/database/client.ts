import { Client, type ClientOptions } from 'cassandra-driver'
import { errorMessage, log } from '../plumbing/logger.ts'
import { getDatabaseConfig } from './config.ts'

let databaseClient: Client | null = null

export const isDatabaseEnabledForEnv = (): boolean => {
  if (process.env.SCYLLA_DISABLED === 'true') {
    return false
  }

  // Tests talk to fakes unless a real cluster is asked for explicitly
  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }

  return true
}

const createCassandraClient = (options?: { skipKeyspace?: boolean }): Client => {
  const config = getDatabaseConfig()

  const clientOptions: ClientOptions = {
    contactPoints: config.hosts.map((host) => `${host}:${config.port}`),
    localDataCenter: config.localDataCenter,
    // Migrations connect before the keyspace exists
    keyspace: options?.skipKeyspace ? undefined : config.keyspace,
    credentials:
      config.username && config.password
        ? {
            username: config.username,
            password: config.password,
          }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
    queryOptions: {
      prepare: true,
      fetchSize: config.fetchSize,
    },
  }

  return new Client(clientOptions)
}

export const getDatabaseClient = (): Client => {
  if (!databaseClient) {
    throw new Error(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  }

  return databaseClient
}

/**
 * Connect to the account store, retrying a bounded number of times.
 * Throws once retries are exhausted; callers treat that as fatal.
 */
export const initializeDatabase = async (options?: {
  skipKeyspace?: boolean
}): Promise<void> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database initialization skipped for current environment')
    return
  }

  if (databaseClient) {
    log('Database client already initialized')
    return
  }

  const config = getDatabaseConfig()
  let attempt = 0

  while (true) {
    attempt += 1
    const candidate = createCassandraClient(options)

    try {
      await candidate.connect()
      databaseClient = candidate

      log({
        message: 'Database connection established',
        hosts: config.hosts,
        keyspace: options?.skipKeyspace
          ? '(none - for migrations)'
          : config.keyspace,
        localDataCenter: config.localDataCenter,
        attempt,
      })
      return
    } catch (error) {
      log(
        {
          message: 'Failed to connect to database',
          error: errorMessage(error),
          attempt,
        },
        'warn',
      )

      try {
        await candidate.shutdown()
      } catch (shutdownError) {
        log(
          {
            message: 'Error shutting down failed client',
            error: errorMessage(shutdownError),
          },
          'warn',
        )
      }

      if (attempt >= config.connectRetries) {
        throw error instanceof Error ? error : new Error(errorMessage(error))
      }

      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null

  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log(
      {
        message: 'Error while closing database connection',
        error: errorMessage(error),
      },
      'warn',
    )
  }
}
