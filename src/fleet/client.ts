import type {
  CreateAccountInput,
  ListAccountsInput,
} from '../accounts/types/requests.ts'
import {
  AdapterUnavailableError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../plumbing/errors.ts'
import { errorMessage } from '../plumbing/logger.ts'
import type { SurfaceOperations } from '../surface/types/operations.ts'
import {
  isAccountList,
  isAccountStatusView,
  isAccountView,
  isBackupList,
  isBackupSummary,
  isBulkLockReport,
  isIssuedAccount,
  isReconcileReport,
  isRestoreSummary,
  isSystemStatus,
} from './responses.ts'
import type { FleetServer } from './types/server.ts'

export type FetchLike = (
  input: string,
  init: RequestInit,
) => Promise<Response>

export interface FleetClientOptions {
  timeoutMs: number
  fetch?: FetchLike
}

const readMessage = (payload: unknown, fallback: string): string =>
  typeof payload === 'object' &&
  payload !== null &&
  'error' in payload &&
  typeof payload.error === 'string'
    ? payload.error
    : fallback

/**
 * Rebuild the lifecycle error a remote server answered with, so remote and
 * local failures reach the surfaces in the same shape.
 */
export const remoteError = (
  server: FleetServer,
  status: number,
  payload: unknown,
): Error => {
  const message = `${server.id}: ${readMessage(payload, `HTTP ${status}`)}`
  switch (status) {
    case 400:
      return new ValidationError(message)
    case 404:
      return new NotFoundError(message)
    case 409:
      return new ConflictError(message)
    case 502:
    case 503:
    case 504:
      return new AdapterUnavailableError(message)
    case 401:
      return new Error(`${server.id}: API token rejected`)
    default:
      return new Error(message)
  }
}

const encodeInput = (input: CreateAccountInput): Record<string, unknown> => ({
  ...input,
  expiresAt: input.expiresAt ? input.expiresAt.toISOString() : input.expiresAt,
})

const listQuery = (input: ListAccountsInput = {}): string => {
  const params = new URLSearchParams()
  if (input.protocol) params.set('protocol', input.protocol)
  if (input.state) params.set('state', input.state)
  if (input.limit !== undefined) params.set('limit', String(input.limit))
  const query = params.toString()
  return query ? `?${query}` : ''
}

/**
 * SurfaceOperations over another server's HTTP API.
 */
export const createFleetClient = (
  server: FleetServer,
  options: FleetClientOptions,
): SurfaceOperations => {
  const fetchImpl: FetchLike = options.fetch ?? fetch

  const request = async (
    method: string,
    path: string,
    body?: unknown,
    signal?: AbortSignal,
  ): Promise<unknown> => {
    let response: Response
    try {
      response = await fetchImpl(`${server.apiEndpoint}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${server.authToken}`,
          ...(body !== undefined && { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: signal ?? AbortSignal.timeout(options.timeoutMs),
      })
    } catch (error) {
      throw new AdapterUnavailableError(
        `${server.id} is unreachable: ${errorMessage(error)}`,
        { cause: error },
      )
    }

    if (response.status === 204) {
      return null
    }

    const text = await response.text()
    let payload: unknown = null
    if (text.trim() !== '') {
      try {
        payload = JSON.parse(text)
      } catch {
        payload = null
      }
    }

    if (!response.ok) {
      throw remoteError(server, response.status, payload)
    }
    return payload
  }

  const checked = <T>(
    payload: unknown,
    guard: (value: unknown) => value is T,
    what: string,
  ): T => {
    if (!guard(payload)) {
      throw new Error(`${server.id}: unexpected ${what} response`)
    }
    return payload
  }

  const account = (id: string): string =>
    `/api/accounts/${encodeURIComponent(id)}`

  return {
    create: async (input) =>
      checked(
        await request('POST', '/api/accounts', encodeInput(input)),
        isIssuedAccount,
        'create',
      ),

    delete: async (id) => {
      await request('DELETE', account(id))
    },

    lock: async (id) =>
      checked(await request('POST', `${account(id)}/lock`), isAccountView, 'lock'),

    unlock: async (id) =>
      checked(
        await request('POST', `${account(id)}/unlock`),
        isAccountView,
        'unlock',
      ),

    renew: async (id, input) =>
      checked(
        await request('POST', `${account(id)}/renew`, {
          ...input,
          expiresAt: input.expiresAt?.toISOString(),
        }),
        isAccountView,
        'renew',
      ),

    setQuota: async (id, input) =>
      checked(
        await request('PUT', `${account(id)}/quota`, input),
        isAccountView,
        'quota',
      ),

    rotateCredential: async (id) =>
      checked(
        await request('POST', `${account(id)}/rotate-credential`),
        isIssuedAccount,
        'rotate-credential',
      ),

    status: async (id) =>
      checked(await request('GET', account(id)), isAccountStatusView, 'status'),

    list: async (input) =>
      checked(
        await request('GET', `/api/accounts${listQuery(input)}`),
        isAccountList,
        'list',
      ).accounts,

    lockOverQuota: async (signal) =>
      checked(
        await request('POST', '/api/lock-over-quota', undefined, signal),
        isBulkLockReport,
        'lock-over-quota',
      ),

    reconcile: async (signal) =>
      checked(
        await request('POST', '/api/reconcile', undefined, signal),
        isReconcileReport,
        'reconcile',
      ),

    backup: async () =>
      checked(await request('POST', '/api/backup'), isBackupSummary, 'backup'),

    listBackups: async () =>
      checked(await request('GET', '/api/backups'), isBackupList, 'backups')
        .backups,

    restore: async (file) =>
      checked(
        await request('POST', '/api/restore', { file }),
        isRestoreSummary,
        'restore',
      ),

    systemStatus: async () =>
      checked(await request('GET', '/api/status'), isSystemStatus, 'status'),
  }
}

export type FleetResult<T> =
  | { serverId: string; ok: true; value: T }
  | { serverId: string; ok: false; error: string }

/**
 * Run one task per server in parallel; one server failing never hides the
 * others' answers.
 */
export const fanOut = async <T>(
  servers: FleetServer[],
  task: (server: FleetServer) => Promise<T>,
): Promise<FleetResult<T>[]> => {
  const settled = await Promise.allSettled(servers.map(task))
  return settled.map((result, index): FleetResult<T> => {
    const serverId = servers[index]?.id ?? String(index)
    return result.status === 'fulfilled'
      ? { serverId, ok: true, value: result.value }
      : { serverId, ok: false, error: errorMessage(result.reason) }
  })
}
