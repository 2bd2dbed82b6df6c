import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import type { Account } from '../accounts/types/account.ts'
import { AdapterUnavailableError } from '../plumbing/errors.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import { expectSuccess } from './command-runner.ts'
import type {
  CommandResult,
  CommandRunner,
  ProtocolAdapter,
  UsageSnapshot,
} from './types/adapter.ts'
import type { XrayAdapterConfig } from './types/adapter-config.ts'

export type XrayProtocol = 'vmess' | 'vless' | 'trojan'

type XrayClient =
  | { id: string; email: string; alterId: number }
  | { id: string; email: string; flow?: string }
  | { password: string; email: string }

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

const isNotFound = (result: CommandResult): boolean =>
  /not found/i.test(`${result.stdout}\n${result.stderr}`)

const toCounter = (value: unknown): number => {
  const n = typeof value === 'string' ? Number(value) : value
  return typeof n === 'number' && Number.isFinite(n) ? n : 0
}

export const buildXrayClient = (
  protocol: XrayProtocol,
  account: Account,
  vlessFlow?: string,
): XrayClient => {
  const { credential } = account

  if (protocol === 'trojan') {
    if (credential.kind !== 'secret') {
      throw new AdapterUnavailableError(
        `Trojan account ${account.id} has no secret credential`,
      )
    }
    return { password: credential.secret, email: account.id }
  }

  if (credential.kind !== 'uuid') {
    throw new AdapterUnavailableError(
      `${protocol} account ${account.id} has no UUID credential`,
    )
  }
  if (protocol === 'vmess') {
    return { id: credential.uuid, email: account.id, alterId: 0 }
  }
  return vlessFlow
    ? { id: credential.uuid, email: account.id, flow: vlessFlow }
    : { id: credential.uuid, email: account.id }
}

/**
 * Sum uplink and downlink from `xray api statsquery` JSON output.
 * Counter values are int64 and may be serialized as strings.
 */
export const parseTrafficStats = (output: string): number => {
  const trimmed = output.trim()
  if (trimmed === '') return 0

  const parsed: unknown = JSON.parse(trimmed)
  if (!isRecord(parsed) || !Array.isArray(parsed.stat)) return 0

  let total = 0
  for (const entry of parsed.stat) {
    if (!isRecord(entry) || typeof entry.name !== 'string') continue
    if (entry.name.endsWith('>>>uplink') || entry.name.endsWith('>>>downlink')) {
      total += toCounter(entry.value)
    }
  }
  return total
}

export const parseOnlineStats = (output: string): number => {
  const trimmed = output.trim()
  if (trimmed === '') return 0

  const parsed: unknown = JSON.parse(trimmed)
  if (!isRecord(parsed) || !isRecord(parsed.stat)) return 0
  return toCounter(parsed.stat.value)
}

/**
 * One adapter per Xray inbound. Users are added and removed through the
 * running core's HandlerService, so no restart and no other client is touched.
 */
export const createXrayAdapter = (
  protocol: XrayProtocol,
  config: XrayAdapterConfig,
  run: CommandRunner,
): ProtocolAdapter => {
  const tag = config.inboundTags[protocol]
  const server = `--server=${config.apiServer}`

  const removeUser = (id: string): Promise<CommandResult> =>
    run(config.binary, ['api', 'rmu', server, `-tag=${tag}`, id])

  const addUser = async (account: Account): Promise<void> => {
    const inbound = {
      inbounds: [
        {
          tag,
          protocol,
          settings: {
            clients: [buildXrayClient(protocol, account, config.vlessFlow)],
          },
        },
      ],
    }

    const dir = await mkdtemp(path.join(tmpdir(), 'xray-adu-'))
    const file = path.join(dir, 'inbound.json')
    try {
      await writeFile(file, JSON.stringify(inbound), { mode: 0o600 })
      expectSuccess(
        await run(config.binary, ['api', 'adu', server, file]),
        `xray api adu (${tag})`,
      )
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  }

  return {
    name: protocol,

    apply: async (account: Account): Promise<void> => {
      // adu refuses an email that already exists, so replace it
      const removed = await removeUser(account.id)
      if (removed.exitCode !== 0 && !isNotFound(removed)) {
        expectSuccess(removed, `xray api rmu (${tag})`)
      }
      await addUser(account)
    },

    // Removing the client also refuses its open connections' next handshake;
    // Xray has no per-user kill, so `disconnect` needs nothing extra
    revoke: async (id: string): Promise<void> => {
      const result = await removeUser(id)
      if (result.exitCode !== 0 && !isNotFound(result)) {
        expectSuccess(result, `xray api rmu (${tag})`)
      }
    },

    isOnline: async (id: string): Promise<UsageSnapshot> => {
      const traffic = expectSuccess(
        await run(config.binary, [
          'api',
          'statsquery',
          server,
          '-pattern',
          `user>>>${id}>>>traffic`,
        ]),
        'xray api statsquery',
      )

      let bytes: number
      try {
        bytes = parseTrafficStats(traffic.stdout)
      } catch (error) {
        throw new AdapterUnavailableError(
          `Unreadable xray statsquery output: ${errorMessage(error)}`,
          { cause: error },
        )
      }

      // statsonline exits non-zero when the user has no online counter yet
      let sessions = 0
      const online = await run(config.binary, [
        'api',
        'statsonline',
        server,
        '-email',
        id,
      ])
      if (online.exitCode === 0) {
        try {
          sessions = parseOnlineStats(online.stdout)
        } catch (error) {
          log(
            {
              message: 'Unreadable xray statsonline output',
              account_id: id,
              error: errorMessage(error),
            },
            'warn',
          )
        }
      }

      return { sessions, bytes }
    },
  }
}
