import info from '../../package.json' with { type: 'json' }

const { name, version } = info

export type LogValue = string | number | boolean | object | null | undefined

export type LogLevel = 'info' | 'warn' | 'error'

export const log = (
  message: string | { message: string; [key: string]: LogValue },
  level: LogLevel = 'info',
) => {
  let logMessage: {
    message: string
    app: string
    version: string
    level: LogLevel
    [key: string]: LogValue
  }
  if (typeof message === 'string') {
    logMessage = {
      message,
      app: name,
      version,
      level,
    }
  } else {
    logMessage = {
      ...message,
      app: name,
      version,
      level,
    }
  }
  if (level === 'error') {
    console.error(logMessage)
    return
  }
  console.log(logMessage)
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
