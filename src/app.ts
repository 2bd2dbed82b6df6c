import 'dotenv/config'
import { serve } from '@hono/node-server'
import { checkDatabaseHealth } from './database/health.ts'
import { errorMessage, log } from './plumbing/logger.ts'
import { createRuntime, type Runtime } from './runtime.ts'
import { createApiApp } from './surface/api/app.ts'
import { createBotHandler } from './surface/bot/commands.ts'
import { getSurfaceConfig } from './surface/config.ts'

const start = async (): Promise<void> => {
  const config = getSurfaceConfig()
  if (!config.apiToken) {
    log({ message: 'API_TOKEN is not set; refusing to start' }, 'error')
    process.exit(1)
  }

  let runtime: Runtime
  try {
    runtime = await createRuntime()
  } catch (error) {
    log(
      { message: 'Failed to connect to the account store', error: errorMessage(error) },
      'error',
    )
    process.exit(1)
  }

  // daemon configs may have drifted while the service was down
  const report = await runtime.controller.reconcile()
  log({
    message: 'Startup reconcile finished',
    applied: report.applied,
    revoked: report.revoked,
    pruned: report.pruned,
    failed: report.failed.length,
  })
  runtime.tracker.start()

  const app = createApiApp({
    operations: runtime.operations,
    apiToken: config.apiToken,
    checkHealth: checkDatabaseHealth,
    bot:
      config.botAdminIds.length > 0
        ? createBotHandler({
            operations: runtime.operations,
            adminIds: config.botAdminIds,
          })
        : undefined,
  })

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    if (!process.env.PORT) {
      log('process.env.PORT is undefined - defaulting to 3000')
    }
    log(`Tunnel account API listening at http://localhost:${info.port}`)
  })

  let stopping = false
  const shutdown = (signal: string): void => {
    if (stopping) return
    stopping = true
    log({ message: 'Shutting down', signal })

    server.close()
    runtime.close().then(
      () => process.exit(0),
      (error: unknown) => {
        log(
          { message: 'Shutdown failed', error: errorMessage(error) },
          'error',
        )
        process.exit(1)
      },
    )
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

start().catch((error: unknown) => {
  log({ message: 'Startup failed', error: errorMessage(error) }, 'error')
  process.exit(1)
})
