import { createHash, timingSafeEqual } from 'node:crypto'
import type { MiddlewareHandler } from 'hono'
import { logAuditEvent } from '../plumbing/audit-log.ts'

const extractBearerToken = (authHeader: string | undefined): string | null => {
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null
  }
  const token = authHeader.slice(7).trim()
  return token.length > 0 ? token : null
}

const digest = (value: string): Buffer =>
  createHash('sha256').update(value).digest()

/**
 * Constant-time comparison; hashing first makes the lengths equal.
 */
export const tokensMatch = (presented: string, expected: string): boolean =>
  timingSafeEqual(digest(presented), digest(expected))

/**
 * Hono middleware that checks the shared API token.
 * Returns 401 with WWW-Authenticate header on a missing or wrong token.
 */
export const requireApiToken = (expectedToken: string): MiddlewareHandler => {
  return async (c, next) => {
    const token = extractBearerToken(c.req.header('Authorization'))

    if (!token || !tokensMatch(token, expectedToken)) {
      logAuditEvent({
        event: 'surface_auth_failure',
        surface: 'api',
        reason: token ? 'invalid_token' : 'missing_token',
      })
      c.header('WWW-Authenticate', 'Bearer realm="tunnel-accounts"')
      return c.json({ error: 'Unauthorized', kind: 'unauthorized' }, 401)
    }

    await next()
  }
}

export const isBotAdmin = (userId: string, adminIds: string[]): boolean =>
  adminIds.includes(userId)
