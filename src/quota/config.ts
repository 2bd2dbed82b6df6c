import { parseNumber } from '../plumbing/parse-env.ts'

export interface TrackerConfig {
  intervalMs: number
}

let cachedConfig: TrackerConfig | null = null

export const getTrackerConfig = (): TrackerConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const config: TrackerConfig = {
    intervalMs: parseNumber(process.env.TRACKER_INTERVAL_MS, 60_000),
  }

  if (config.intervalMs < 1_000) {
    throw new Error('TRACKER_INTERVAL_MS must be at least 1000')
  }

  cachedConfig = config
  return config
}

export const clearTrackerConfigCache = (): void => {
  cachedConfig = null
}
