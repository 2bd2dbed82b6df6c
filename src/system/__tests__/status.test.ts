import { describe, expect, it, vi } from 'vitest'
import { buildAccount } from '../../../tests/support/accounts.ts'
import { createFakeRunner } from '../../../tests/support/fake-runner.ts'
import { createMemoryStore } from '../../../tests/support/memory-store.ts'
import type { CommandRunner } from '../../adapters/types/adapter.ts'
import { AdapterUnavailableError } from '../../plumbing/errors.ts'
import { checkService } from '../service-status.ts'
import { countAccounts, createSystemStatus } from '../status.ts'

vi.mock('../../plumbing/logger.ts', () => ({
  log: vi.fn(),
  errorMessage: (error: unknown) =>
    error instanceof Error ? error.message : String(error),
}))

const NOW = new Date('2026-10-19T00:00:00.000Z')

describe('System status', () => {
  describe('checkService', () => {
    it('should report an active unit as running', async () => {
      const fake = createFakeRunner(() => ({ stdout: 'active\n' }))

      expect(await checkService(fake.run, 'xray')).toEqual({
        name: 'xray',
        status: 'active',
        running: true,
      })
      expect(fake.commandLines()).toEqual(['systemctl is-active xray'])
    })

    it('should report the printed state of a stopped unit', async () => {
      const fake = createFakeRunner(() => ({ exitCode: 3, stdout: 'inactive\n' }))

      expect(await checkService(fake.run, 'xl2tpd')).toEqual({
        name: 'xl2tpd',
        status: 'inactive',
        running: false,
      })
    })

    it('should report unknown when systemctl cannot run', async () => {
      const run = vi.fn<CommandRunner>().mockRejectedValue(
        new AdapterUnavailableError('Command could not be started: systemctl'),
      )

      expect(await checkService(run, 'sshd')).toEqual({
        name: 'sshd',
        status: 'unknown',
        running: false,
      })
    })
  })

  describe('countAccounts', () => {
    it('should count accounts by state', async () => {
      const { store } = createMemoryStore([
        buildAccount({ id: 'u1' }),
        buildAccount({ id: 'u2' }),
        buildAccount({ id: 'u3', state: 'locked', lockReason: 'manual' }),
        buildAccount({ id: 'u4', state: 'expired' }),
      ])

      expect(await countAccounts(store)).toEqual({
        active: 2,
        locked: 1,
        expired: 1,
        total: 4,
      })
    })
  })

  describe('createSystemStatus', () => {
    it('should combine services, database health and account counts', async () => {
      const fake = createFakeRunner((_command, args) => ({
        stdout: args[1] === 'sshd' ? 'active\n' : 'failed\n',
      }))
      const { store } = createMemoryStore([buildAccount()])
      const getStatus = createSystemStatus({
        store,
        run: fake.run,
        services: ['sshd', 'openvpn'],
        checkDatabase: async () => ({
          isHealthy: true,
          message: 'Database connection is healthy',
        }),
        now: () => NOW,
      })

      const status = await getStatus()

      expect(status.checkedAt).toBe('2026-10-19T00:00:00.000Z')
      expect(status.services).toEqual([
        { name: 'sshd', status: 'active', running: true },
        { name: 'openvpn', status: 'failed', running: false },
      ])
      expect(status.database.isHealthy).toBe(true)
      expect(status.accounts).toEqual({ active: 1, locked: 0, expired: 0, total: 1 })
      expect(status.host.cpuCount).toBeGreaterThan(0)
    })

    it('should not read the store when the database is unhealthy', async () => {
      const { store } = createMemoryStore([buildAccount()])
      const list = vi.spyOn(store, 'list')
      const getStatus = createSystemStatus({
        store,
        run: createFakeRunner().run,
        services: [],
        checkDatabase: async () => ({ isHealthy: false, message: 'down' }),
      })

      const status = await getStatus()

      expect(status.accounts.total).toBe(0)
      expect(list).not.toHaveBeenCalled()
    })
  })
})
