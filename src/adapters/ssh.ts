/**
 * SSH accounts are system users shared by OpenSSH and Dropbear through PAM.
 * Changes go straight to the user database, so neither daemon restarts.
 */

import type { Account } from '../accounts/types/account.ts'
import { AdapterUnavailableError, ConflictError } from '../plumbing/errors.ts'
import { expectSuccess } from './command-runner.ts'
import type {
  ApplySecrets,
  CommandRunner,
  ProtocolAdapter,
  RevokeOptions,
  UsageSnapshot,
} from './types/adapter.ts'
import type { SshAdapterConfig } from './types/adapter-config.ts'

/** GECOS comment on every user this service creates */
export const MANAGED_USER_COMMENT = 'tunnel-accounts'

// Exit codes documented in getent(1), userdel(8), usermod(8) and pkill(1)
const KEY_NOT_FOUND = 2
const USER_DOES_NOT_EXIST = 6
const NO_PROCESSES_MATCHED = 1
const CHAIN_ALREADY_EXISTS = 1
const RULE_NOT_FOUND = 1

const SESSION_PROCESS_PATTERN = '^(sshd|dropbear)$'

/** `usermod -e` takes a calendar date; the empty string clears expiry */
export const formatExpiryDate = (expiresAt: Date | null): string =>
  expiresAt ? expiresAt.toISOString().slice(0, 10) : ''

/**
 * Sum the byte counters of the owner-match rules for one uid in
 * `iptables -nvx -L <chain>` output.
 */
export const parseAccountingBytes = (output: string, uid: string): number => {
  let total = 0
  for (const line of output.split('\n')) {
    const match = /owner UID match (\d+)\s*$/.exec(line.trim())
    if (!match || match[1] !== uid) continue
    const columns = line.trim().split(/\s+/)
    const bytes = Number(columns[1])
    if (Number.isFinite(bytes)) total += bytes
  }
  return total
}

export interface SystemUser {
  uid: string
  managed: boolean
}

/** One `getent passwd` line: name:password:uid:gid:gecos:home:shell */
export const parsePasswdEntry = (line: string): SystemUser | null => {
  const fields = line.trim().split(':')
  if (fields.length < 7) return null
  const [, , uid = '', , gecos = ''] = fields
  return { uid, managed: gecos === MANAGED_USER_COMMENT }
}

const unmanagedUser = (id: string): ConflictError =>
  new ConflictError(
    `System user ${id} exists and is not managed by tunnel-accounts`,
  )

export const createSshAdapter = (
  config: SshAdapterConfig,
  run: CommandRunner,
): ProtocolAdapter => {
  let chainReady = false

  const lookupUser = async (id: string): Promise<SystemUser | null> => {
    const result = expectSuccess(
      await run('getent', ['passwd', id]),
      'getent passwd',
      [KEY_NOT_FOUND],
    )
    if (result.exitCode === KEY_NOT_FOUND) return null
    const user = parsePasswdEntry(result.stdout)
    if (!user) {
      throw new AdapterUnavailableError(`Unreadable passwd entry for ${id}`)
    }
    return user
  }

  const ruleArgs = (id: string): string[] => [
    config.accountingChain,
    '-m',
    'owner',
    '--uid-owner',
    id,
    '-j',
    'RETURN',
  ]

  const ensureAccountingChain = async (): Promise<void> => {
    if (chainReady) return
    expectSuccess(
      await run('iptables', ['-w', '-N', config.accountingChain]),
      'iptables -N',
      [CHAIN_ALREADY_EXISTS],
    )
    const jump = ['OUTPUT', '-j', config.accountingChain]
    const hooked = await run('iptables', ['-w', '-C', ...jump])
    if (hooked.exitCode !== 0) {
      expectSuccess(
        await run('iptables', ['-w', '-I', 'OUTPUT', '1', '-j', config.accountingChain]),
        'iptables -I OUTPUT',
      )
    }
    chainReady = true
  }

  const ensureAccountingRule = async (id: string): Promise<void> => {
    await ensureAccountingChain()
    const present = await run('iptables', ['-w', '-C', ...ruleArgs(id)])
    if (present.exitCode !== 0) {
      expectSuccess(
        await run('iptables', ['-w', '-A', ...ruleArgs(id)]),
        'iptables -A',
      )
    }
  }

  const killSessions = async (id: string): Promise<void> => {
    expectSuccess(
      await run('pkill', ['-KILL', '-u', id]),
      'pkill',
      [NO_PROCESSES_MATCHED],
    )
  }

  return {
    name: 'ssh',

    apply: async (account: Account, secrets?: ApplySecrets): Promise<void> => {
      const id = account.id
      const user = await lookupUser(id)
      if (user && !user.managed) {
        throw unmanagedUser(id)
      }

      if (!user) {
        if (!secrets?.password) {
          throw new AdapterUnavailableError(
            `System user ${id} is missing and no password is available; rotate the credential`,
          )
        }
        expectSuccess(
          await run('useradd', [
            '-M',
            '-c',
            MANAGED_USER_COMMENT,
            '-s',
            config.shell,
            id,
          ]),
          'useradd',
        )
      }

      if (secrets?.password) {
        expectSuccess(
          await run('chpasswd', [], { input: `${id}:${secrets.password}\n` }),
          'chpasswd',
        )
      }

      expectSuccess(
        await run('usermod', ['-U', '-e', formatExpiryDate(account.expiresAt), id]),
        'usermod -U',
      )

      await ensureAccountingRule(id)
    },

    revoke: async (id: string, options: RevokeOptions = {}): Promise<void> => {
      const user = await lookupUser(id)
      if (!user) return
      if (!user.managed) {
        throw unmanagedUser(id)
      }

      if (options.purge) {
        await killSessions(id)
        expectSuccess(await run('userdel', ['-f', id]), 'userdel', [
          USER_DOES_NOT_EXIST,
        ])
        expectSuccess(
          await run('iptables', ['-w', '-D', ...ruleArgs(id)]),
          'iptables -D',
          [RULE_NOT_FOUND],
        )
        return
      }

      // Expiry in 1970 also stops public-key logins, which -L alone does not
      expectSuccess(await run('usermod', ['-L', '-e', '1', id]), 'usermod -L', [
        USER_DOES_NOT_EXIST,
      ])

      if (options.disconnect) {
        await killSessions(id)
      }
    },

    isOnline: async (id: string): Promise<UsageSnapshot> => {
      const user = await lookupUser(id)
      if (!user?.managed) {
        return { sessions: 0, bytes: 0 }
      }

      const sessions = expectSuccess(
        await run('pgrep', ['-c', '-u', id, SESSION_PROCESS_PATTERN]),
        'pgrep',
        [NO_PROCESSES_MATCHED],
      )
      const counters = expectSuccess(
        await run('iptables', ['-w', '-nvx', '-L', config.accountingChain]),
        'iptables -L',
      )

      return {
        sessions: Number(sessions.stdout.trim()) || 0,
        bytes: parseAccountingBytes(counters.stdout, user.uid),
      }
    },
  }
}
