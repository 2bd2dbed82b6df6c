#!/usr/bin/env tsx
import 'dotenv/config'
import { createFleetClient } from '../../fleet/client.ts'
import { getFleetConfig, getFleetServers } from '../../fleet/config.ts'
import type { FleetServer } from '../../fleet/types/server.ts'
import { NotFoundError } from '../../plumbing/errors.ts'
import { createRuntime, type Runtime } from '../../runtime.ts'
import { runCli } from './commands.ts'

const abort = new AbortController()
process.once('SIGINT', () => {
  console.error('Interrupted; stopping after the current account')
  abort.abort()
})

const fleetClient = (server: FleetServer) =>
  createFleetClient(server, { timeoutMs: getFleetConfig().timeoutMs })

const main = async (): Promise<void> => {
  const opened: Runtime[] = []

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      io: {
        out: (text) => console.log(text),
        err: (text) => console.error(text),
      },
      operations: async (serverId) => {
        if (serverId !== undefined) {
          const server = getFleetServers().find(({ id }) => id === serverId)
          if (!server) {
            throw new NotFoundError(`Unknown fleet server: ${serverId}`)
          }
          return fleetClient(server)
        }
        const runtime = await createRuntime()
        opened.push(runtime)
        return runtime.operations
      },
      fleetServers: getFleetServers,
      fleetClient,
      signal: abort.signal,
    })
  } finally {
    for (const runtime of opened) {
      await runtime.close()
    }
  }
}

main().catch((error) => {
  console.error('Fatal error:', error)
  process.exit(1)
})
