import { type Context, Hono } from 'hono'
import { ValidationError } from '../../plumbing/errors.ts'
import {
  parseCreateRequest,
  parseListRequest,
  parseQuotaRequest,
  parseRenewRequest,
  parseRestoreRequest,
} from '../requests.ts'
import type { SurfaceOperations } from '../types/operations.ts'

export const readJson = async (c: Context): Promise<unknown> => {
  const text = await c.req.text()
  if (text.trim() === '') return {}
  try {
    return JSON.parse(text)
  } catch {
    throw new ValidationError('Request body is not valid JSON')
  }
}

/**
 * Account and maintenance routes. Mounted under /api behind the token check;
 * errors propagate to the app's error handler.
 */
export const createApiRoutes = (
  ops: SurfaceOperations,
  now: () => Date = () => new Date(),
): Hono => {
  const api = new Hono()

  /**
   * POST /api/accounts
   * Create an account; the credential is returned only here
   */
  api.post('/accounts', async (c) => {
    const issued = await ops.create(parseCreateRequest(await readJson(c), now()))
    return c.json(issued, 201)
  })

  /**
   * GET /api/accounts?protocol=&state=&limit=
   */
  api.get('/accounts', async (c) => {
    const accounts = await ops.list(parseListRequest(c.req.query()))
    return c.json({ accounts })
  })

  /**
   * GET /api/accounts/:id
   * Account record plus live session count
   */
  api.get('/accounts/:id', async (c) => {
    return c.json(await ops.status(c.req.param('id')))
  })

  api.post('/accounts/:id/lock', async (c) => {
    return c.json(await ops.lock(c.req.param('id')))
  })

  api.post('/accounts/:id/unlock', async (c) => {
    return c.json(await ops.unlock(c.req.param('id')))
  })

  /**
   * POST /api/accounts/:id/renew
   * Body: { days } or { expiresAt }, optional resetUsage
   */
  api.post('/accounts/:id/renew', async (c) => {
    const input = parseRenewRequest(await readJson(c))
    return c.json(await ops.renew(c.req.param('id'), input))
  })

  api.post('/accounts/:id/rotate-credential', async (c) => {
    return c.json(await ops.rotateCredential(c.req.param('id')))
  })

  /**
   * PUT /api/accounts/:id/quota
   * Body: { quotaBytes?, quotaLoginCount? }; null removes a limit
   */
  api.put('/accounts/:id/quota', async (c) => {
    const input = parseQuotaRequest(await readJson(c))
    return c.json(await ops.setQuota(c.req.param('id'), input))
  })

  api.delete('/accounts/:id', async (c) => {
    await ops.delete(c.req.param('id'))
    return c.body(null, 204)
  })

  api.post('/lock-over-quota', async (c) => {
    return c.json(await ops.lockOverQuota(c.req.raw.signal))
  })

  api.post('/reconcile', async (c) => {
    return c.json(await ops.reconcile(c.req.raw.signal))
  })

  api.post('/backup', async (c) => {
    return c.json(await ops.backup(), 201)
  })

  api.get('/backups', async (c) => {
    return c.json({ backups: await ops.listBackups() })
  })

  /**
   * POST /api/restore
   * Body: { file } naming a backup in the backup directory
   */
  api.post('/restore', async (c) => {
    const file = parseRestoreRequest(await readJson(c))
    return c.json(await ops.restore(file))
  })

  api.get('/status', async (c) => {
    return c.json(await ops.systemStatus())
  })

  return api
}
