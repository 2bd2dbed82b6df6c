/**
 * OpenVPN accounts are certificate holders. The server reads
 * client-config-dir on every connect, so a per-account fragment with a
 * `disable` line is enough to refuse new sessions without a reload.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { Account } from '../accounts/types/account.ts'
import { AdapterUnavailableError, hasErrorCode } from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import {
  type ManagementEndpoint,
  sendManagementCommand,
} from './openvpn-management.ts'
import type {
  ProtocolAdapter,
  RevokeOptions,
  UsageSnapshot,
} from './types/adapter.ts'
import type { OpenVpnAdapterConfig } from './types/adapter-config.ts'

const FRAGMENT_HEADER = '# Managed by tunnel-accounts; edits are overwritten\n'

export type ManagementCommandSender = (
  endpoint: ManagementEndpoint,
  command: string,
) => Promise<string>

/**
 * Count CLIENT_LIST rows for one common name in a version 2 (comma) or
 * version 3 (tab) status file and sum their byte counters.
 */
export const parseStatusFile = (
  content: string,
  commonName: string,
): UsageSnapshot => {
  let sessions = 0
  let bytes = 0

  for (const line of content.split('\n')) {
    const fields = line.trim().split(/[,\t]/)
    // CLIENT_LIST,cn,real,virtual,virtual6,bytes received,bytes sent,...
    if (fields[0] !== 'CLIENT_LIST' || fields[1] !== commonName) continue
    sessions += 1
    const received = Number(fields[5])
    const sent = Number(fields[6])
    if (Number.isFinite(received)) bytes += received
    if (Number.isFinite(sent)) bytes += sent
  }

  return { sessions, bytes }
}

export const createOpenVpnAdapter = (
  config: OpenVpnAdapterConfig,
  timeoutMs: number,
  sendCommand: ManagementCommandSender = sendManagementCommand,
): ProtocolAdapter => {
  const endpoint: ManagementEndpoint = {
    host: config.managementHost,
    port: config.managementPort,
    timeoutMs,
  }

  const fragmentPath = (id: string): string =>
    path.join(config.clientConfigDir, id)

  const replaceFile = async (target: string, content: string): Promise<void> => {
    const temp = `${target}.tmp`
    await writeFile(temp, content, { mode: 0o644 })
    await rename(temp, target)
  }

  /** Returns the fragment it replaced, or null when there was none */
  const writeFragment = async (
    id: string,
    body: string,
  ): Promise<string | null> => {
    const target = fragmentPath(id)
    try {
      let previous: string | null = null
      try {
        previous = await readFile(target, 'utf8')
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) throw error
      }
      await replaceFile(target, `${FRAGMENT_HEADER}${body}`)
      return previous
    } catch (error) {
      throw new AdapterUnavailableError(
        `Cannot write OpenVPN client config for ${id}: ${errorMessage(error)}`,
        { cause: error },
      )
    }
  }

  const restoreFragment = async (
    id: string,
    previous: string | null,
  ): Promise<void> => {
    try {
      if (previous === null) {
        await rm(fragmentPath(id), { force: true })
      } else {
        await replaceFile(fragmentPath(id), previous)
      }
    } catch (error) {
      log(
        {
          message: 'Failed to restore OpenVPN client config',
          account_id: id,
          error: errorMessage(error),
        },
        'error',
      )
    }
  }

  const killSessions = async (commonName: string): Promise<void> => {
    const reply = await sendCommand(endpoint, `kill ${commonName}`)
    // "ERROR: common name 'x' not found" means nothing was connected
    if (reply.startsWith('ERROR:') && !/not found/i.test(reply)) {
      throw new AdapterUnavailableError(
        `OpenVPN refused to disconnect ${commonName}: ${reply}`,
      )
    }
  }

  return {
    name: 'openvpn',

    apply: async (account: Account): Promise<void> => {
      if (account.credential.kind !== 'certificate') {
        throw new AdapterUnavailableError(
          `OpenVPN account ${account.id} has no certificate credential`,
        )
      }
      await writeFragment(account.id, '')
    },

    revoke: async (id: string, options: RevokeOptions = {}): Promise<void> => {
      // A purged account keeps a disabling fragment: its certificate stays
      // valid until the CA revokes it
      const previous = await writeFragment(id, 'disable\n')
      if (options.disconnect || options.purge) {
        try {
          await killSessions(id)
        } catch (error) {
          await restoreFragment(id, previous)
          throw error
        }
      }
    },

    isOnline: async (id: string): Promise<UsageSnapshot> => {
      let content: string
      try {
        content = await readFile(config.statusPath, 'utf8')
      } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
          return { sessions: 0, bytes: 0 }
        }
        throw new AdapterUnavailableError(
          `Cannot read OpenVPN status file: ${errorMessage(error)}`,
          { cause: error },
        )
      }
      return parseStatusFile(content, id)
    },
  }
}
