import { Hono } from 'hono'
import info from '../../../package.json' with { type: 'json' }
import type { DatabaseHealthStatus } from '../../database/health.ts'
import { ValidationError } from '../../plumbing/errors.ts'
import { requireApiToken } from '../auth.ts'
import type { BotHandler, BotMessage } from '../bot/commands.ts'
import { errorResponse } from '../errors.ts'
import { asRequestBody } from '../requests.ts'
import type { SurfaceOperations } from '../types/operations.ts'
import { createApiRoutes, readJson } from './routes.ts'

const { name, version } = info

export interface ApiAppOptions {
  operations: SurfaceOperations
  apiToken: string
  checkHealth: () => Promise<DatabaseHealthStatus>
  /** Chat transports relay updates here; omitted when no admins are set */
  bot?: BotHandler
  now?: () => Date
}

const parseBotMessage = (value: unknown): BotMessage => {
  const body = asRequestBody(value)
  const { userId, text } = body
  if (typeof userId !== 'string' && typeof userId !== 'number') {
    throw new ValidationError('userId is required')
  }
  if (typeof text !== 'string') {
    throw new ValidationError('text is required')
  }
  return { userId: String(userId), text }
}

export const createApiApp = ({
  operations,
  apiToken,
  checkHealth,
  bot,
  now,
}: ApiAppOptions): Hono => {
  const app = new Hono()

  app.get('/health', async (c) => {
    const health = await checkHealth()
    return c.json(
      { status: health.isHealthy ? 'ok' : 'unavailable', database: health },
      health.isHealthy ? 200 : 503,
    )
  })

  app.get('/about', (c) => {
    return c.json({ name, version })
  })

  app.use('/api/*', requireApiToken(apiToken))
  app.route('/api', createApiRoutes(operations, now))

  if (bot) {
    /**
     * POST /api/bot/messages { userId, text } -> { reply }
     */
    app.post('/api/bot/messages', async (c) => {
      const reply = await bot(parseBotMessage(await readJson(c)))
      return c.json({ reply })
    })
  }

  app.notFound((c) => c.json({ error: 'Not found', kind: 'not_found' }, 404))
  app.onError((error) => errorResponse(error))

  return app
}
