import { fanOut } from '../../fleet/client.ts'
import type { FleetServer } from '../../fleet/types/server.ts'
import { ValidationError } from '../../plumbing/errors.ts'
import { describeError, EXIT_CODES } from '../errors.ts'
import {
  parseCreateRequest,
  parseListRequest,
  parseQuotaRequest,
  parseRenewRequest,
  readAccountId,
} from '../requests.ts'
import type { SurfaceOperations } from '../types/operations.ts'
import {
  assertKnownFlags,
  booleanFlag,
  type ParsedArgs,
  parseArgs,
  positional,
  stringFlag,
} from './args.ts'

export interface CliOutput {
  out(text: string): void
  err(text: string): void
}

export interface CliContext {
  io: CliOutput
  /** Local operations, or a fleet server's when an id is given */
  operations(serverId: string | undefined): Promise<SurfaceOperations>
  fleetServers(): FleetServer[]
  fleetClient(server: FleetServer): SurfaceOperations
  /** Aborted on SIGINT; bulk commands stop between accounts */
  signal?: AbortSignal
  now?: () => Date
}

interface CommandSpec {
  usage: string
  flags: string[]
  run(args: ParsedArgs, ops: SurfaceOperations, context: CliContext): Promise<number>
}

const print = (context: CliContext, value: unknown): void => {
  context.io.out(JSON.stringify(value, null, 2))
}

const withFailures = (failed: unknown[]): number =>
  failed.length > 0 ? EXIT_CODES.adapter_unavailable : 0

const listInput = (args: ParsedArgs) =>
  parseListRequest({
    protocol: stringFlag(args, 'protocol'),
    state: stringFlag(args, 'state'),
    limit: stringFlag(args, 'limit'),
  })

const COMMANDS = new Map<string, CommandSpec>([
  [
    'add-user',
    {
      usage:
        'add-user <id> <protocol> [--password p] [--uuid u] [--certificate path] [--quota 10GB] [--max-logins n] [--days n | --expires ISO]',
      flags: ['password', 'uuid', 'certificate', 'quota', 'max-logins', 'days', 'expires'],
      run: async (args, ops, context) => {
        const input = parseCreateRequest(
          {
            id: positional(args, 0, 'id'),
            protocol: positional(args, 1, 'protocol'),
            password: stringFlag(args, 'password'),
            uuid: stringFlag(args, 'uuid'),
            certificatePath: stringFlag(args, 'certificate'),
            quotaBytes: stringFlag(args, 'quota'),
            quotaLoginCount: stringFlag(args, 'max-logins'),
            days: stringFlag(args, 'days'),
            expiresAt: stringFlag(args, 'expires'),
          },
          context.now?.(),
        )
        print(context, await ops.create(input))
        context.io.err('The credential is shown once; store it now.')
        return 0
      },
    },
  ],
  [
    'delete-user',
    {
      usage: 'delete-user <id>',
      flags: [],
      run: async (args, ops, context) => {
        const id = readAccountId(positional(args, 0, 'id'))
        await ops.delete(id)
        context.io.out(`Deleted ${id}`)
        return 0
      },
    },
  ],
  [
    'lock-user',
    {
      usage: 'lock-user <id>',
      flags: [],
      run: async (args, ops, context) => {
        print(context, await ops.lock(positional(args, 0, 'id')))
        return 0
      },
    },
  ],
  [
    'unlock-user',
    {
      usage: 'unlock-user <id>',
      flags: [],
      run: async (args, ops, context) => {
        print(context, await ops.unlock(positional(args, 0, 'id')))
        return 0
      },
    },
  ],
  [
    'renew-user',
    {
      usage: 'renew-user <id> (--days n | --expires ISO) [--keep-usage]',
      flags: ['days', 'expires', 'keep-usage'],
      run: async (args, ops, context) => {
        const input = parseRenewRequest({
          days: stringFlag(args, 'days'),
          expiresAt: stringFlag(args, 'expires'),
          resetUsage: booleanFlag(args, 'keep-usage') ? false : undefined,
        })
        print(context, await ops.renew(positional(args, 0, 'id'), input))
        return 0
      },
    },
  ],
  [
    'set-quota',
    {
      usage: 'set-quota <id> [--quota 10GB|unlimited] [--max-logins n|unlimited]',
      flags: ['quota', 'max-logins'],
      run: async (args, ops, context) => {
        const input = parseQuotaRequest({
          quotaBytes: stringFlag(args, 'quota'),
          quotaLoginCount: stringFlag(args, 'max-logins'),
        })
        print(context, await ops.setQuota(positional(args, 0, 'id'), input))
        return 0
      },
    },
  ],
  [
    'rotate-credential',
    {
      usage: 'rotate-credential <id>',
      flags: [],
      run: async (args, ops, context) => {
        print(context, await ops.rotateCredential(positional(args, 0, 'id')))
        context.io.err('The credential is shown once; store it now.')
        return 0
      },
    },
  ],
  [
    'user-info',
    {
      usage: 'user-info <id>',
      flags: [],
      run: async (args, ops, context) => {
        print(context, await ops.status(positional(args, 0, 'id')))
        return 0
      },
    },
  ],
  [
    'list-users',
    {
      usage: 'list-users [--protocol p] [--state s] [--limit n] [--fleet]',
      flags: ['protocol', 'state', 'limit', 'fleet'],
      run: async (args, ops, context) => {
        print(context, await ops.list(listInput(args)))
        return 0
      },
    },
  ],
  [
    'lock-over-quota',
    {
      usage: 'lock-over-quota',
      flags: [],
      run: async (_args, ops, context) => {
        const report = await ops.lockOverQuota(context.signal)
        print(context, report)
        return withFailures(report.failed)
      },
    },
  ],
  [
    'reconcile',
    {
      usage: 'reconcile',
      flags: [],
      run: async (_args, ops, context) => {
        const report = await ops.reconcile(context.signal)
        print(context, report)
        return withFailures(report.failed)
      },
    },
  ],
  [
    'backup',
    {
      usage: 'backup [--list]',
      flags: ['list'],
      run: async (args, ops, context) => {
        if (booleanFlag(args, 'list')) {
          print(context, await ops.listBackups())
          return 0
        }
        print(context, await ops.backup())
        return 0
      },
    },
  ],
  [
    'restore',
    {
      usage: 'restore <backup_YYYYMMDD_HHMMSS.json>',
      flags: [],
      run: async (args, ops, context) => {
        const summary = await ops.restore(positional(args, 0, 'file'))
        print(context, summary)
        return withFailures(summary.reconcile.failed)
      },
    },
  ],
  [
    'status',
    {
      usage: 'status',
      flags: [],
      run: async (_args, ops, context) => {
        print(context, await ops.systemStatus())
        return 0
      },
    },
  ],
])

export const usage = (): string =>
  [
    'Usage: tunnel-accounts <command> [options] [--server <id>]',
    '',
    ...[...COMMANDS.values()].map((spec) => `  ${spec.usage}`),
    '',
    '--server <id> sends the command to a fleet server over its API.',
  ].join('\n')

const listFleet = async (
  args: ParsedArgs,
  context: CliContext,
): Promise<number> => {
  const servers = context.fleetServers()
  if (servers.length === 0) {
    throw new ValidationError('No fleet servers are configured')
  }

  const input = listInput(args)
  const results = await fanOut(servers, (server) =>
    context.fleetClient(server).list(input),
  )
  print(
    context,
    results.map((result) =>
      result.ok
        ? { server: result.serverId, accounts: result.value }
        : { server: result.serverId, error: result.error },
    ),
  )
  return withFailures(results.filter((result) => !result.ok))
}

/**
 * Run one CLI invocation and return its exit code. Output goes through
 * `context.io` so the process wrapper stays thin.
 */
export const runCli = async (
  argv: string[],
  context: CliContext,
): Promise<number> => {
  try {
    const args = parseArgs(argv)
    if (args.command === undefined) {
      context.io.err(usage())
      return EXIT_CODES.validation
    }
    if (args.command === 'help' || booleanFlag(args, 'help')) {
      context.io.out(usage())
      return 0
    }

    const spec = COMMANDS.get(args.command)
    if (!spec) {
      throw new ValidationError(
        `Unknown command: ${args.command}. Run "tunnel-accounts help".`,
      )
    }
    assertKnownFlags(args, spec.flags)

    if (args.command === 'list-users' && booleanFlag(args, 'fleet')) {
      return await listFleet(args, context)
    }

    const ops = await context.operations(stringFlag(args, 'server'))
    return await spec.run(args, ops, context)
  } catch (error) {
    const { kind, message } = describeError(error)
    context.io.err(`Error: ${message}`)
    return EXIT_CODES[kind]
  }
}
