import { parseList, parseNumber } from '../plumbing/parse-env.ts'

export interface SurfaceConfig {
  port: number
  /** Bearer token for the HTTP API; the API refuses to start without it */
  apiToken: string | undefined
  /** Chat user ids allowed to run bot commands */
  botAdminIds: string[]
}

export const getSurfaceConfig = (): SurfaceConfig => ({
  port: parseNumber(process.env.PORT, 3000),
  apiToken: process.env.API_TOKEN || undefined,
  botAdminIds: parseList(process.env.BOT_ADMIN_IDS),
})
