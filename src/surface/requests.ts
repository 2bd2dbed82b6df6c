/**
 * Turns untrusted surface input (JSON bodies, query strings, CLI flags, bot
 * arguments) into controller inputs. Numbers may arrive as strings.
 */

import type {
  CreateAccountInput,
  ListAccountsInput,
  QuotaInput,
  RenewAccountInput,
} from '../accounts/types/requests.ts'
import { isAccountState, isProtocol } from '../accounts/validation.ts'
import { PROTOCOLS } from '../accounts/types/account.ts'
import { ValidationError } from '../plumbing/errors.ts'

const DAY_MS = 24 * 60 * 60 * 1000

const BYTE_UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  kb: 1024,
  m: 1024 ** 2,
  mb: 1024 ** 2,
  g: 1024 ** 3,
  gb: 1024 ** 3,
  t: 1024 ** 4,
  tb: 1024 ** 4,
}

const UNLIMITED = ['unlimited', 'none', 'null']

export type RequestBody = Record<string, unknown>

export const isRequestBody = (value: unknown): value is RequestBody =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

export const asRequestBody = (value: unknown): RequestBody => {
  if (!isRequestBody(value)) {
    throw new ValidationError('Request body must be a JSON object')
  }
  return value
}

const readString = (body: RequestBody, key: string): string => {
  const value = body[key]
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${key} is required`)
  }
  return value.trim()
}

const readOptionalString = (
  body: RequestBody,
  key: string,
): string | undefined => {
  const value = body[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`)
  }
  return value
}

const readOptionalInteger = (
  body: RequestBody,
  key: string,
): number | undefined => {
  const value = body[key]
  if (value === undefined || value === null || value === '') return undefined
  const parsed = typeof value === 'string' ? Number(value.trim()) : value
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${key} must be an integer`)
  }
  return parsed
}

const readOptionalBoolean = (
  body: RequestBody,
  key: string,
): boolean | undefined => {
  const value = body[key]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'boolean') return value
  if (value === 'true') return true
  if (value === 'false') return false
  throw new ValidationError(`${key} must be true or false`)
}

const readOptionalDate = (
  body: RequestBody,
  key: string,
): Date | undefined => {
  const value = readOptionalString(body, key)
  if (value === undefined) return undefined
  const date = new Date(value)
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${key} must be an ISO 8601 date`)
  }
  return date
}

/**
 * Byte counts: a plain integer, or a number with a binary unit such as
 * "500MB" or "1.5G". "unlimited" clears the limit.
 */
export const parseByteSize = (
  value: unknown,
  key = 'quotaBytes',
): number | null => {
  if (value === null) return null
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new ValidationError(`${key} must be a non-negative integer`)
    }
    return value
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a byte count`)
  }

  const normalized = value.trim().toLowerCase()
  if (UNLIMITED.includes(normalized)) return null

  const match = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/.exec(normalized)
  const unit = match ? BYTE_UNITS[match[2] || 'b'] : undefined
  if (!match || unit === undefined) {
    throw new ValidationError(
      `${key} must be a byte count such as 1073741824, 500MB or 10GB`,
    )
  }
  return Math.round(Number(match[1]) * unit)
}

const readOptionalLimit = (
  body: RequestBody,
  key: string,
): number | null | undefined => {
  if (!(key in body) || body[key] === undefined) return undefined
  const value = body[key]
  if (typeof value === 'string' && UNLIMITED.includes(value.trim().toLowerCase())) {
    return null
  }
  const parsed = typeof value === 'string' ? Number(value.trim()) : value
  if (parsed === null) return null
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new ValidationError(`${key} must be a non-negative integer`)
  }
  return parsed
}

const readOptionalByteLimit = (
  body: RequestBody,
  key: string,
): number | null | undefined =>
  !(key in body) || body[key] === undefined
    ? undefined
    : parseByteSize(body[key], key)

export const readAccountId = (value: unknown): string => {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError('Account id is required')
  }
  return value.trim()
}

/**
 * `days` is accepted as a shorthand for an expiry counted from now.
 */
export const parseCreateRequest = (
  value: unknown,
  now: Date = new Date(),
): CreateAccountInput => {
  const body = asRequestBody(value)
  const protocol = readString(body, 'protocol')
  if (!isProtocol(protocol)) {
    throw new ValidationError(
      `protocol must be one of ${PROTOCOLS.join(', ')}`,
    )
  }

  const days = readOptionalInteger(body, 'days')
  const expiresAt = readOptionalDate(body, 'expiresAt')
  if (days !== undefined && expiresAt !== undefined) {
    throw new ValidationError('Pass either days or expiresAt, not both')
  }
  if (days !== undefined && days < 1) {
    throw new ValidationError('days must be at least 1')
  }

  const input: CreateAccountInput = {
    id: readString(body, 'id'),
    protocol,
  }

  const password = readOptionalString(body, 'password')
  const uuid = readOptionalString(body, 'uuid')
  const certificatePath = readOptionalString(body, 'certificatePath')
  const quotaBytes = readOptionalByteLimit(body, 'quotaBytes')
  const quotaLoginCount = readOptionalLimit(body, 'quotaLoginCount')

  if (password !== undefined) input.password = password
  if (uuid !== undefined) input.uuid = uuid
  if (certificatePath !== undefined) input.certificatePath = certificatePath
  if (quotaBytes !== undefined) input.quotaBytes = quotaBytes
  if (quotaLoginCount !== undefined) input.quotaLoginCount = quotaLoginCount
  if (days !== undefined) {
    input.expiresAt = new Date(now.getTime() + days * DAY_MS)
  } else if (expiresAt !== undefined) {
    input.expiresAt = expiresAt
  }

  return input
}

export const parseRenewRequest = (value: unknown): RenewAccountInput => {
  const body = asRequestBody(value)
  const input: RenewAccountInput = {}

  const days = readOptionalInteger(body, 'days')
  const expiresAt = readOptionalDate(body, 'expiresAt')
  const resetUsage = readOptionalBoolean(body, 'resetUsage')

  if (days !== undefined) input.days = days
  if (expiresAt !== undefined) input.expiresAt = expiresAt
  if (resetUsage !== undefined) input.resetUsage = resetUsage

  return input
}

export const parseQuotaRequest = (value: unknown): QuotaInput => {
  const body = asRequestBody(value)
  const input: QuotaInput = {}

  const quotaBytes = readOptionalByteLimit(body, 'quotaBytes')
  const quotaLoginCount = readOptionalLimit(body, 'quotaLoginCount')

  if (quotaBytes !== undefined) input.quotaBytes = quotaBytes
  if (quotaLoginCount !== undefined) input.quotaLoginCount = quotaLoginCount

  return input
}

export const parseListRequest = (value: unknown): ListAccountsInput => {
  const body = asRequestBody(value)
  const input: ListAccountsInput = {}

  const protocol = readOptionalString(body, 'protocol')
  const state = readOptionalString(body, 'state')
  const limit = readOptionalInteger(body, 'limit')

  if (protocol !== undefined) {
    if (!isProtocol(protocol)) {
      throw new ValidationError(
        `protocol must be one of ${PROTOCOLS.join(', ')}`,
      )
    }
    input.protocol = protocol
  }
  if (state !== undefined) {
    if (!isAccountState(state) || state === 'deleted') {
      throw new ValidationError('state must be one of active, locked, expired')
    }
    input.state = state
  }
  if (limit !== undefined) input.limit = limit

  return input
}

export const parseRestoreRequest = (value: unknown): string =>
  readString(asRequestBody(value), 'file')

const BYTE_LABELS = ['B', 'KB', 'MB', 'GB', 'TB']

export const formatBytes = (bytes: number | null): string => {
  if (bytes === null) return 'unlimited'
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < BYTE_LABELS.length - 1) {
    value /= 1024
    unit += 1
  }
  const rounded = unit === 0 ? String(value) : value.toFixed(2).replace(/\.?0+$/, '')
  return `${rounded} ${BYTE_LABELS[unit]}`
}
