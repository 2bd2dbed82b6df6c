import { readFileSync } from 'node:fs'
import { hasErrorCode } from '../plumbing/errors.ts'
import { errorMessage } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-env.ts'
import type { FleetConfig, FleetServer } from './types/server.ts'

const SERVER_ID_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/

let cachedConfig: FleetConfig | null = null

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const parseServer = (value: unknown, index: number): FleetServer => {
  if (!isRecord(value)) {
    throw new Error(`Fleet server ${index} is not an object`)
  }
  const { id, apiEndpoint, authToken } = value
  if (typeof id !== 'string' || !SERVER_ID_PATTERN.test(id)) {
    throw new Error(`Fleet server ${index} has an invalid id`)
  }
  if (typeof apiEndpoint !== 'string' || !URL.canParse(apiEndpoint)) {
    throw new Error(`Fleet server ${id} has an invalid apiEndpoint`)
  }
  const { protocol } = new URL(apiEndpoint)
  if (protocol !== 'https:' && protocol !== 'http:') {
    throw new Error(`Fleet server ${id} apiEndpoint must be http or https`)
  }
  if (typeof authToken !== 'string' || authToken.length === 0) {
    throw new Error(`Fleet server ${id} has no authToken`)
  }
  return { id, apiEndpoint: apiEndpoint.replace(/\/+$/, ''), authToken }
}

/**
 * Parse the fleet file: either a list of servers or { servers: [...] }.
 */
export const parseFleetServers = (content: string): FleetServer[] => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new Error(`Fleet config is not valid JSON: ${errorMessage(error)}`)
  }

  const list = isRecord(parsed) ? parsed.servers : parsed
  if (!Array.isArray(list)) {
    throw new Error('Fleet config must list servers')
  }

  const servers = list.map(parseServer)
  const ids = new Set<string>()
  for (const server of servers) {
    if (ids.has(server.id)) {
      throw new Error(`Fleet server ${server.id} is listed twice`)
    }
    ids.add(server.id)
  }
  return servers
}

const readServers = (path: string | undefined): FleetServer[] => {
  if (!path) return []
  try {
    return parseFleetServers(readFileSync(path, 'utf8'))
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return []
    throw error
  }
}

export const getFleetConfig = (): FleetConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  cachedConfig = {
    servers: readServers(
      process.env.FLEET_CONFIG_PATH || '/etc/tunnel-accounts/fleet.json',
    ),
    timeoutMs: parseNumber(process.env.FLEET_TIMEOUT_MS, 10_000),
  }
  return cachedConfig
}

export const getFleetServers = (): FleetServer[] => getFleetConfig().servers

export const clearFleetConfigCache = (): void => {
  cachedConfig = null
}
