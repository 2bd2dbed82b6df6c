import type { AccountView } from '../../accounts/types/requests.ts'
import type { IssuedAccount } from '../../lifecycle/types/controller.ts'
import { logAuditEvent } from '../../plumbing/audit-log.ts'
import { ValidationError } from '../../plumbing/errors.ts'
import type { SystemStatus } from '../../system/types/status.ts'
import { isBotAdmin } from '../auth.ts'
import { botErrorText } from '../errors.ts'
import {
  formatBytes,
  parseCreateRequest,
  parseListRequest,
  parseRenewRequest,
  readAccountId,
} from '../requests.ts'
import type { SurfaceOperations } from '../types/operations.ts'

/** Telegram caps a message at 4096 characters */
const MAX_LISTED = 50

export interface BotMessage {
  /** Chat user id as the transport reports it */
  userId: string
  text: string
}

export interface BotContext {
  operations: SurfaceOperations
  adminIds: string[]
  now?: () => Date
}

export type BotHandler = (message: BotMessage) => Promise<string>

const HELP = [
  'Available commands:',
  '/adduser <id> <protocol> [password] [quota] [days] - Add an account; quota= and days= also work',
  '/deluser <id> - Delete an account',
  '/listuser [protocol] - List accounts',
  '/status [id] - Service status, or one account',
  '/lock <id> - Lock an account',
  '/unlock <id> - Unlock an account',
  '/renew <id> <days> - Extend an account',
  '/backup - Write a backup',
  '/restore <file> - Restore a backup',
].join('\n')

const formatDate = (iso: string | null): string =>
  iso === null ? 'never' : iso.slice(0, 10)

const formatUsage = (view: AccountView): string =>
  `${formatBytes(view.usageBytes)} / ${formatBytes(view.quotaBytes)}`

const formatAccountLine = (view: AccountView): string =>
  `${view.id} | ${view.protocol} | ${view.state} | ${formatUsage(view)} | expires ${formatDate(view.expiresAt)}`

const formatIssued = ({ account, credential }: IssuedAccount): string =>
  [
    `Added ${account.id} (${account.protocol})`,
    credential.password !== undefined && `Password: ${credential.password}`,
    credential.uuid !== undefined && `UUID: ${credential.uuid}`,
    credential.certificatePath !== undefined &&
      `Certificate: ${credential.certificatePath}`,
    `Quota: ${formatBytes(account.quotaBytes)}`,
    `Expires: ${formatDate(account.expiresAt)}`,
  ]
    .filter((line): line is string => typeof line === 'string')
    .join('\n')

const formatSystemStatus = (status: SystemStatus): string =>
  [
    'Services:',
    ...status.services.map((service) => `  ${service.name}: ${service.status}`),
    `Database: ${status.database.isHealthy ? 'healthy' : status.database.message}`,
    `Accounts: ${status.accounts.active} active, ${status.accounts.locked} locked, ${status.accounts.expired} expired`,
  ].join('\n')

/**
 * `/cmd@botname a b` -> ['cmd', ['a', 'b']]
 */
export const parseCommand = (
  text: string,
): { command: string; args: string[] } | null => {
  const [head, ...args] = text.trim().split(/\s+/)
  if (!head || !head.startsWith('/')) return null
  const command = head.slice(1).split('@')[0]?.toLowerCase() ?? ''
  return { command, args }
}

const ADDUSER_KEYWORDS = ['password', 'quota', 'days']

/** Quota words as /adduser takes them: a size with a unit, or unlimited */
const looksLikeQuota = (arg: string): boolean =>
  /^\d+(?:\.\d+)?[a-z]+$/i.test(arg) || arg.toLowerCase() === 'unlimited'

/**
 * Split `/adduser` trailing args into `key=value` keywords and positional
 * [password] [quota] [days] slots. A password slot holding a quota is
 * treated as skipped.
 */
export const parseAddUserArgs = (
  args: string[],
  takesPassword: boolean,
  usage: string,
): { password?: string; quota?: string; days?: string } => {
  const keywords = new Map<string, string>()
  const positional: string[] = []
  for (const arg of args) {
    const match = /^([a-z]+)=(.*)$/i.exec(arg)
    const key = match?.[1]?.toLowerCase()
    if (match && key !== undefined && ADDUSER_KEYWORDS.includes(key)) {
      keywords.set(key, match[2] ?? '')
    } else {
      positional.push(arg)
    }
  }

  const first = positional[0]
  const slots: (string | undefined)[] =
    takesPassword && (first === undefined || !looksLikeQuota(first))
      ? positional
      : [undefined, ...positional]
  if (slots.length > 3) {
    throw new ValidationError(`Usage: ${usage}`)
  }

  const [password, quota, days] = slots
  return {
    password: keywords.get('password') ?? password,
    quota: keywords.get('quota') ?? quota,
    days: keywords.get('days') ?? days,
  }
}

const argAt = (args: string[], index: number, usage: string): string => {
  const value = args[index]
  if (value === undefined) {
    throw new ValidationError(`Usage: ${usage}`)
  }
  return value
}

/**
 * Transport-agnostic bot commands: text in, reply text out. Only allowlisted
 * admins get past the first check.
 */
export const createBotHandler = (context: BotContext): BotHandler => {
  const ops = context.operations

  const run = async (command: string, args: string[]): Promise<string> => {
    switch (command) {
      case 'start':
        return 'Welcome. Use /help to see available commands.'

      case 'help':
        return HELP

      case 'adduser': {
        const usage = '/adduser <id> <protocol> [password] [quota] [days]'
        const protocol = argAt(args, 1, usage)
        // no password slot for uuid and certificate protocols
        const takesPassword = !['vmess', 'vless', 'openvpn'].includes(protocol)
        const { password, quota, days } = parseAddUserArgs(
          args.slice(2),
          takesPassword,
          usage,
        )
        const input = parseCreateRequest(
          {
            id: argAt(args, 0, usage),
            protocol,
            password,
            quotaBytes: quota,
            days,
          },
          context.now?.(),
        )
        return formatIssued(await ops.create(input))
      }

      case 'deluser': {
        const id = readAccountId(argAt(args, 0, '/deluser <id>'))
        await ops.delete(id)
        return `Deleted ${id}`
      }

      case 'listuser': {
        const accounts = await ops.list(parseListRequest({ protocol: args[0] }))
        if (accounts.length === 0) {
          return 'No accounts found.'
        }
        const lines = accounts.slice(0, MAX_LISTED).map(formatAccountLine)
        if (accounts.length > MAX_LISTED) {
          lines.push(`... and ${accounts.length - MAX_LISTED} more`)
        }
        return ['Accounts:', ...lines].join('\n')
      }

      case 'status': {
        const id = args[0]
        if (id === undefined) {
          return formatSystemStatus(await ops.systemStatus())
        }
        const view = await ops.status(id)
        return [
          formatAccountLine(view),
          `Online sessions: ${view.online === null ? 'unknown' : view.online}`,
          ...(view.lockReason ? [`Lock reason: ${view.lockReason}`] : []),
        ].join('\n')
      }

      case 'lock': {
        const view = await ops.lock(argAt(args, 0, '/lock <id>'))
        return `${view.id} is now ${view.state}`
      }

      case 'unlock': {
        const view = await ops.unlock(argAt(args, 0, '/unlock <id>'))
        return `${view.id} is now ${view.state}`
      }

      case 'renew': {
        const usage = '/renew <id> <days>'
        const id = argAt(args, 0, usage)
        const view = await ops.renew(
          id,
          parseRenewRequest({ days: argAt(args, 1, usage) }),
        )
        return `${view.id} renewed until ${formatDate(view.expiresAt)} (${view.state})`
      }

      case 'backup': {
        const summary = await ops.backup()
        return `Backup written: ${summary.file} (${summary.accounts} accounts)`
      }

      case 'restore': {
        const summary = await ops.restore(argAt(args, 0, '/restore <file>'))
        const { applied, revoked, failed } = summary.reconcile
        return [
          `Restored ${summary.restored} accounts from ${summary.file}`,
          `Reconcile: ${applied} applied, ${revoked} revoked, ${failed.length} failed`,
        ].join('\n')
      }

      default:
        return `Unknown command /${command}. Use /help to see available commands.`
    }
  }

  return async ({ userId, text }) => {
    const parsed = parseCommand(text)
    if (!parsed) {
      return 'Use /help to see available commands.'
    }

    if (!isBotAdmin(userId, context.adminIds)) {
      logAuditEvent({
        event: 'surface_auth_failure',
        surface: 'bot',
        reason: `user ${userId} is not an admin`,
      })
      return 'Unauthorized access.'
    }

    try {
      return await run(parsed.command, parsed.args)
    } catch (error) {
      return botErrorText(error)
    }
  }
}
