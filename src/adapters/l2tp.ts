/**
 * L2TP/IPsec peers authenticate with CHAP against /etc/ppp/chap-secrets.
 * pppd has no control API, so each account owns one fragment file and the
 * assembled secrets file is rewritten and re-read once per burst of changes.
 */

import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { Account } from '../accounts/types/account.ts'
import { AdapterUnavailableError, hasErrorCode } from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import { expectSuccess } from './command-runner.ts'
import {
  createDebouncedReloader,
  type DebouncedReloader,
} from './debounced-reloader.ts'
import type {
  CommandRunner,
  ProtocolAdapter,
  RevokeOptions,
  UsageSnapshot,
} from './types/adapter.ts'
import type { L2tpAdapterConfig } from './types/adapter-config.ts'

export const CHAP_SECRETS_HEADER = [
  '# Secrets for authentication using CHAP',
  '# Generated by tunnel-accounts from per-account fragments; do not edit',
  '# client\tserver\tsecret\tIP addresses',
  '',
].join('\n')

const NO_SUCH_PROCESS = 1

interface PppSession {
  iface: string
  peer: string
  pid: number
}

const readIfExists = async (file: string): Promise<string | null> => {
  try {
    return await readFile(file, 'utf8')
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null
    throw error
  }
}

export const formatChapLine = (
  id: string,
  serverName: string,
  secret: string,
): string => `"${id}"\t${serverName}\t"${secret}"\t*\n`

/** Session files hold "<peer name> <pppd pid>", written by an ip-up hook */
export const parseSessionFile = (
  iface: string,
  content: string,
): PppSession | null => {
  const [peer, pidText] = content.trim().split(/\s+/)
  const pid = Number(pidText)
  if (!peer || !Number.isSafeInteger(pid) || pid <= 0) return null
  return { iface, peer, pid }
}

export interface L2tpAdapter extends ProtocolAdapter {
  listManaged(): Promise<string[]>
  /** Rewrite chap-secrets from the fragments and run the reload command */
  rebuild(): Promise<void>
}

export const createL2tpAdapter = (
  config: L2tpAdapterConfig,
  run: CommandRunner,
  reloadDebounceMs: number,
): L2tpAdapter => {
  const fragmentPath = (id: string): string =>
    path.join(config.fragmentsDir, id)

  const listFragments = async (): Promise<string[]> => {
    try {
      const names = await readdir(config.fragmentsDir)
      return names.filter((name) => !name.startsWith('.')).sort()
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return []
      throw error
    }
  }

  const writeSecrets = async (): Promise<number> => {
    const names = await listFragments()
    const parts: string[] = [CHAP_SECRETS_HEADER]
    for (const name of names) {
      const fragment = await readIfExists(path.join(config.fragmentsDir, name))
      if (fragment) parts.push(fragment)
    }

    const temp = `${config.chapSecretsPath}.tmp`
    await writeFile(temp, parts.join(''), { mode: 0o600 })
    await rename(temp, config.chapSecretsPath)
    return names.length
  }

  const rebuild = async (): Promise<void> => {
    const peers = await writeSecrets()
    const [command, ...args] = config.reloadCommand
    if (command) {
      expectSuccess(await run(command, args), 'L2TP secrets reload')
    }
    log({ message: 'Reloaded L2TP secrets', peers })
  }

  const reloader: DebouncedReloader = createDebouncedReloader(
    rebuild,
    reloadDebounceMs,
  )

  /**
   * Put a fragment back the way it was before a failed change and take the
   * change out of chap-secrets, which pppd reads on every authentication.
   */
  const restoreFragment = async (
    id: string,
    previous: string | null,
  ): Promise<void> => {
    try {
      if (previous === null) {
        await rm(fragmentPath(id), { force: true })
      } else {
        await writeFile(fragmentPath(id), previous, { mode: 0o600 })
      }
      await writeSecrets()
    } catch (error) {
      log(
        {
          message: 'Failed to restore CHAP fragment',
          account_id: id,
          error: errorMessage(error),
        },
        'error',
      )
    }
  }

  const scheduleReload = async (): Promise<void> => {
    try {
      await reloader.schedule()
    } catch (error) {
      throw new AdapterUnavailableError(
        `L2TP secrets reload failed: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  const listSessions = async (id: string): Promise<PppSession[]> => {
    let entries: string[]
    try {
      entries = await readdir(config.sessionsDir)
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return []
      throw new AdapterUnavailableError(
        `Cannot read PPP session directory: ${errorMessage(error)}`,
        { cause: error },
      )
    }

    const sessions: PppSession[] = []
    for (const iface of entries) {
      const content = await readIfExists(path.join(config.sessionsDir, iface))
      const session = content === null ? null : parseSessionFile(iface, content)
      if (session && session.peer === id) sessions.push(session)
    }
    return sessions
  }

  const readCounter = async (iface: string, counter: string): Promise<number> => {
    const raw = await readIfExists(
      path.join(config.sysfsNetDir, iface, 'statistics', counter),
    )
    const value = Number(raw?.trim())
    return Number.isFinite(value) ? value : 0
  }

  const killSessions = async (id: string): Promise<void> => {
    for (const session of await listSessions(id)) {
      expectSuccess(
        await run('kill', ['-TERM', String(session.pid)]),
        `kill pppd ${session.pid}`,
        [NO_SUCH_PROCESS],
      )
    }
  }

  return {
    name: 'l2tp',

    apply: async (account: Account): Promise<void> => {
      if (account.credential.kind !== 'secret') {
        throw new AdapterUnavailableError(
          `L2TP account ${account.id} has no CHAP secret`,
        )
      }
      let previous: string | null
      try {
        await mkdir(config.fragmentsDir, { recursive: true, mode: 0o700 })
        previous = await readIfExists(fragmentPath(account.id))
        await writeFile(
          fragmentPath(account.id),
          formatChapLine(account.id, config.serverName, account.credential.secret),
          { mode: 0o600 },
        )
      } catch (error) {
        throw new AdapterUnavailableError(
          `Cannot write CHAP fragment for ${account.id}: ${errorMessage(error)}`,
          { cause: error },
        )
      }

      try {
        await scheduleReload()
      } catch (error) {
        await restoreFragment(account.id, previous)
        throw error
      }
    },

    revoke: async (id: string, options: RevokeOptions = {}): Promise<void> => {
      let previous: string | null
      try {
        previous = await readIfExists(fragmentPath(id))
        await rm(fragmentPath(id), { force: true })
      } catch (error) {
        throw new AdapterUnavailableError(
          `Cannot remove CHAP fragment for ${id}: ${errorMessage(error)}`,
          { cause: error },
        )
      }

      try {
        await scheduleReload()
        if (options.disconnect || options.purge) {
          await killSessions(id)
        }
      } catch (error) {
        await restoreFragment(id, previous)
        throw error
      }
    },

    isOnline: async (id: string): Promise<UsageSnapshot> => {
      const sessions = await listSessions(id)
      let bytes = 0
      for (const session of sessions) {
        bytes += await readCounter(session.iface, 'rx_bytes')
        bytes += await readCounter(session.iface, 'tx_bytes')
      }
      return { sessions: sessions.length, bytes }
    },

    listManaged: async (): Promise<string[]> => {
      try {
        return await listFragments()
      } catch (error) {
        throw new AdapterUnavailableError(
          `Cannot read CHAP fragment directory: ${errorMessage(error)}`,
          { cause: error },
        )
      }
    },

    rebuild,

    close: () => reloader.flushPending(),
  }
}
