import type { CommandRunner } from '../adapters/types/adapter.ts'
import { errorMessage, log } from '../plumbing/logger.ts'
import type { ServiceStatus } from './types/status.ts'

/**
 * `systemctl is-active` exits non-zero for every state but active, so the
 * printed state is what matters, not the exit code.
 */
export const checkService = async (
  run: CommandRunner,
  name: string,
): Promise<ServiceStatus> => {
  try {
    const result = await run('systemctl', ['is-active', name])
    const status = result.stdout.trim() || 'unknown'
    return { name, status, running: status === 'active' }
  } catch (error) {
    log(
      {
        message: 'Service check failed',
        service: name,
        error: errorMessage(error),
      },
      'warn',
    )
    return { name, status: 'unknown', running: false }
  }
}

export const checkServices = (
  run: CommandRunner,
  names: string[],
): Promise<ServiceStatus[]> =>
  Promise.all(names.map((name) => checkService(run, name)))
