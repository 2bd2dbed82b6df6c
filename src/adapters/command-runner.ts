import { execFile } from 'node:child_process'
import { AdapterUnavailableError } from '../plumbing/errors.ts'
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
} from './types/adapter.ts'

const DEFAULT_TIMEOUT_MS = 5_000
const MAX_BUFFER = 4 * 1024 * 1024

const describe = (command: string, args: string[]): string =>
  [command, ...args].join(' ')

/**
 * execFile-backed runner: no shell, bounded output, bounded time.
 */
export const createCommandRunner = (
  defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS,
): CommandRunner => {
  return (
    command: string,
    args: string[],
    options: CommandOptions = {},
  ): Promise<CommandResult> =>
    new Promise((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? defaultTimeoutMs

      const child = execFile(
        command,
        args,
        { timeout: timeoutMs, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr })
            return
          }

          if (error.killed || error.signal) {
            reject(
              new AdapterUnavailableError(
                `Command timed out after ${timeoutMs}ms: ${describe(command, args)}`,
                { cause: error },
              ),
            )
            return
          }

          // Spawn failures carry a string code such as ENOENT
          if (typeof error.code !== 'number') {
            reject(
              new AdapterUnavailableError(
                `Command could not be started: ${describe(command, args)} (${error.code ?? error.message})`,
                { cause: error },
              ),
            )
            return
          }

          resolve({ exitCode: error.code, stdout, stderr })
        },
      )

      if (options.input !== undefined) {
        child.stdin?.end(options.input)
      }
    })
}

/**
 * Turn a non-zero exit into AdapterUnavailableError, except for exit codes
 * the caller treats as success.
 */
export const expectSuccess = (
  result: CommandResult,
  description: string,
  allowedExitCodes: number[] = [],
): CommandResult => {
  if (result.exitCode === 0 || allowedExitCodes.includes(result.exitCode)) {
    return result
  }
  throw new AdapterUnavailableError(
    `${description} failed with exit code ${result.exitCode}: ${result.stderr.trim()}`,
  )
}
