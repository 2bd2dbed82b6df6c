/**
 * Account input validation helpers.
 * Account ids double as system user names, Xray client emails, OpenVPN
 * common names and PPP peer names, so they follow the strictest of those.
 */

import { ValidationError } from '../plumbing/errors.ts'
import {
  ACCOUNT_STATES,
  type Account,
  type AccountState,
  PROTOCOLS,
  type Protocol,
} from './types/account.ts'
import type { CreateAccountInput } from './types/requests.ts'

export const ACCOUNT_ID_PATTERN = /^[a-z_][a-z0-9_-]{1,31}$/
export const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
/** Names of stock system users; an account id never shadows one */
export const RESERVED_ACCOUNT_IDS: ReadonlySet<string> = new Set([
  'root',
  'daemon',
  'bin',
  'sys',
  'sync',
  'games',
  'man',
  'lp',
  'mail',
  'news',
  'uucp',
  'proxy',
  'www-data',
  'backup',
  'list',
  'irc',
  'nobody',
  'sshd',
  'messagebus',
  'syslog',
  'dnsmasq',
  'ntp',
  'postfix',
  'openvpn',
  'xray',
])
export const MIN_PASSWORD_LENGTH = 6
export const MAX_PASSWORD_LENGTH = 128

export const isValidAccountId = (id: unknown): id is string =>
  typeof id === 'string' && ACCOUNT_ID_PATTERN.test(id)

export const isReservedAccountId = (id: string): boolean =>
  RESERVED_ACCOUNT_IDS.has(id) || id.startsWith('systemd-') || id.startsWith('_')

export const isProtocol = (value: unknown): value is Protocol =>
  PROTOCOLS.some((protocol) => protocol === value)

export const isAccountState = (value: unknown): value is AccountState =>
  ACCOUNT_STATES.some((state) => state === value)

const isValidLimit = (value: number | null | undefined): boolean =>
  value === null ||
  value === undefined ||
  (Number.isSafeInteger(value) && value >= 0)

export const assertValidAccountId = (id: unknown): string => {
  if (!isValidAccountId(id)) {
    throw new ValidationError(
      'Invalid account id: use 2-32 lowercase letters, digits, "_" or "-", starting with a letter or "_"',
    )
  }
  return id
}

/**
 * Checks that a record may be written to the store.
 */
export const assertValidAccount = (account: Account): void => {
  assertValidAccountId(account.id)

  if (!isProtocol(account.protocol)) {
    throw new ValidationError(`Invalid protocol: ${String(account.protocol)}`)
  }

  if (!isAccountState(account.state) || account.state === 'deleted') {
    throw new ValidationError(`Invalid account state: ${String(account.state)}`)
  }

  if (!isValidLimit(account.quotaBytes) || !isValidLimit(account.quotaLoginCount)) {
    throw new ValidationError('Quota limits must be non-negative integers')
  }
}

export const assertValidPassword = (password: string): void => {
  if (
    password.length < MIN_PASSWORD_LENGTH ||
    password.length > MAX_PASSWORD_LENGTH
  ) {
    throw new ValidationError(
      `Password must be ${MIN_PASSWORD_LENGTH}-${MAX_PASSWORD_LENGTH} characters`,
    )
  }
  // chpasswd and chap-secrets are line and whitespace delimited
  if (/[\s:"\\]/.test(password)) {
    throw new ValidationError(
      'Password must not contain whitespace, ":", quotes or backslashes',
    )
  }
}

export const assertValidQuota = (
  quotaBytes: number | null | undefined,
  quotaLoginCount: number | null | undefined,
): void => {
  if (!isValidLimit(quotaBytes)) {
    throw new ValidationError('quotaBytes must be a non-negative integer')
  }
  if (!isValidLimit(quotaLoginCount)) {
    throw new ValidationError('quotaLoginCount must be a non-negative integer')
  }
}

export const validateCreateInput = (
  input: CreateAccountInput,
  now: Date,
): void => {
  assertValidAccountId(input.id)
  if (isReservedAccountId(input.id)) {
    throw new ValidationError(`Account id ${input.id} is reserved for a system user`)
  }

  if (!isProtocol(input.protocol)) {
    throw new ValidationError(
      `Invalid protocol: expected one of ${PROTOCOLS.join(', ')}`,
    )
  }

  if (input.password !== undefined) {
    if (!['ssh', 'trojan', 'l2tp'].includes(input.protocol)) {
      throw new ValidationError(
        `A password cannot be set for ${input.protocol} accounts`,
      )
    }
    assertValidPassword(input.password)
  }

  if (input.uuid !== undefined) {
    if (input.protocol !== 'vmess' && input.protocol !== 'vless') {
      throw new ValidationError(
        `A UUID cannot be set for ${input.protocol} accounts`,
      )
    }
    if (!UUID_PATTERN.test(input.uuid)) {
      throw new ValidationError('Invalid UUID')
    }
  }

  if (input.certificatePath !== undefined && input.protocol !== 'openvpn') {
    throw new ValidationError(
      `A certificate cannot be set for ${input.protocol} accounts`,
    )
  }

  assertValidQuota(input.quotaBytes, input.quotaLoginCount)

  if (input.expiresAt && input.expiresAt.getTime() <= now.getTime()) {
    throw new ValidationError('expiresAt must be in the future')
  }
}
