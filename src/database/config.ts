import { parseList, parseNumber } from '../plumbing/parse-env.ts'
import type { DatabaseConfig } from './types/database-config.ts'

const KEYSPACE_PATTERN = /^[a-z][a-z0-9_]{0,47}$/

export const getDatabaseConfig = (): DatabaseConfig => {
  const hosts = parseList(process.env.SCYLLA_HOSTS)
  const keyspace = process.env.SCYLLA_KEYSPACE || 'tunnel_accounts'

  // The keyspace is interpolated into CQL text, so it must be a bare identifier
  if (!KEYSPACE_PATTERN.test(keyspace)) {
    throw new Error(`Invalid SCYLLA_KEYSPACE: ${keyspace}`)
  }

  return {
    hosts: hosts.length > 0 ? hosts : ['localhost'],
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace,
    localDataCenter: process.env.SCYLLA_LOCAL_DATACENTER || 'datacenter1',
    username: process.env.SCYLLA_USERNAME,
    password: process.env.SCYLLA_PASSWORD,
    isSslEnabled: process.env.SCYLLA_SSL === 'true',
    connectTimeoutMs: parseNumber(process.env.SCYLLA_CONNECT_TIMEOUT_MS, 10_000),
    connectRetries: parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3),
    connectRetryDelayMs: parseNumber(
      process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
      1_000,
    ),
    fetchSize: parseNumber(process.env.SCYLLA_FETCH_SIZE, 500),
  }
}
