import { beforeEach, describe, expect, it, vi } from 'vitest'
import { buildAccount } from '../../../tests/support/accounts.ts'
import {
  createFakeAdapters,
  type FakeAdapter,
} from '../../../tests/support/fake-adapters.ts'
import { createMemoryStore } from '../../../tests/support/memory-store.ts'
import type { Protocol } from '../../accounts/types/account.ts'
import {
  AdapterUnavailableError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../../plumbing/errors.ts'
import { createLifecycleController } from '../controller.ts'
import type { LifecycleConfig } from '../types/controller.ts'

vi.mock('../../plumbing/logger.ts', () => ({
  log: vi.fn(),
  errorMessage: (error: unknown) =>
    error instanceof Error ? error.message : String(error),
}))

const NOW = new Date('2026-10-19T00:00:00.000Z')
const DAY_MS = 24 * 60 * 60 * 1000
const GB = 1024 * 1024 * 1024

const baseConfig: LifecycleConfig = {
  adapterTimeoutMs: 1_000,
  breachAction: 'block-new',
  certificateDir: '/etc/openvpn/issued',
}

describe('Lifecycle controller', () => {
  let adapters: Record<Protocol, FakeAdapter>

  const setup = (
    seed = [buildAccount()],
    config: Partial<LifecycleConfig> = {},
  ) => {
    const memory = createMemoryStore(seed)
    const controller = createLifecycleController({
      store: memory.store,
      adapters,
      config: { ...baseConfig, ...config },
      now: () => NOW,
    })
    return { ...memory, controller }
  }

  beforeEach(() => {
    adapters = createFakeAdapters()
  })

  describe('create', () => {
    it('should persist an active account and apply it with the new password', async () => {
      const { controller, rows } = setup([])

      const result = await controller.create({
        id: 'u1',
        protocol: 'ssh',
        password: 'test-secret',
        quotaBytes: GB,
      })

      expect(result.account.state).toBe('active')
      expect(result.account.quotaBytes).toBe(GB)
      expect(result.credential).toEqual({ password: 'test-secret' })
      expect(adapters.ssh.apply).toHaveBeenCalledTimes(1)
      expect(adapters.ssh.apply.mock.calls[0]?.[1]).toEqual({
        password: 'test-secret',
      })

      const stored = rows.get('u1')
      expect(stored?.credential.kind).toBe('password-hash')
      expect(JSON.stringify(stored?.credential)).not.toContain('test-secret')
    })

    it('should generate a UUID for VMess accounts', async () => {
      const { controller } = setup([])

      const result = await controller.create({ id: 'v1', protocol: 'vmess' })

      expect(result.credential.uuid).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
      )
      expect(adapters.vmess.apply).toHaveBeenCalledWith(
        expect.objectContaining({ id: 'v1', protocol: 'vmess' }),
        undefined,
      )
    })

    it('should give exactly one success for two creates of the same id', async () => {
      const { controller } = setup([])

      const results = await Promise.allSettled([
        controller.create({ id: 'u1', protocol: 'ssh' }),
        controller.create({ id: 'u1', protocol: 'vless' }),
      ])

      const fulfilled = results.filter((r) => r.status === 'fulfilled')
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      )
      expect(fulfilled).toHaveLength(1)
      expect(rejected).toHaveLength(1)
      expect(rejected[0]?.reason).toBeInstanceOf(ConflictError)
    })

    it('should roll back the store when apply fails', async () => {
      adapters.ssh.apply.mockRejectedValue(
        new AdapterUnavailableError('useradd failed'),
      )
      const { controller, rows } = setup([])

      await expect(
        controller.create({ id: 'u1', protocol: 'ssh' }),
      ).rejects.toBeInstanceOf(AdapterUnavailableError)
      expect(rows.has('u1')).toBe(false)
    })

    it('should reject a malformed id before touching anything', async () => {
      const { controller } = setup([])

      await expect(
        controller.create({ id: 'Bad Id', protocol: 'ssh' }),
      ).rejects.toBeInstanceOf(ValidationError)
      expect(adapters.ssh.apply).not.toHaveBeenCalled()
    })

    it('should turn a hung adapter into AdapterUnavailable', async () => {
      adapters.l2tp.apply.mockReturnValue(new Promise(() => undefined))
      const { controller, rows } = setup([], { adapterTimeoutMs: 20 })

      await expect(
        controller.create({ id: 'l1', protocol: 'l2tp' }),
      ).rejects.toThrow('l2tp apply for l1 timed out after 20ms')
      expect(rows.has('l1')).toBe(false)
    })
  })

  describe('lock', () => {
    it('should revoke with disconnect and persist a manual lock', async () => {
      const { controller, rows } = setup()

      const view = await controller.lock('u1')

      expect(view.state).toBe('locked')
      expect(view.lockReason).toBe('manual')
      expect(adapters.ssh.revoke).toHaveBeenCalledWith('u1', { disconnect: true })
      expect(rows.get('u1')?.state).toBe('locked')
    })

    it('should be idempotent', async () => {
      const { controller } = setup()

      await controller.lock('u1')
      const second = await controller.lock('u1')

      expect(second.state).toBe('locked')
      expect(adapters.ssh.revoke).toHaveBeenCalledTimes(1)
    })

    it('should leave the stored state unchanged when revoke fails', async () => {
      adapters.ssh.revoke.mockRejectedValue(
        new AdapterUnavailableError('usermod failed'),
      )
      const { controller, rows } = setup()

      await expect(controller.lock('u1')).rejects.toBeInstanceOf(
        AdapterUnavailableError,
      )
      expect(rows.get('u1')?.state).toBe('active')
    })

    it('should pin a quota lock as manual without calling the adapter', async () => {
      const { controller } = setup([
        buildAccount({ state: 'locked', lockReason: 'quota' }),
      ])

      const view = await controller.lock('u1')

      expect(view.lockReason).toBe('manual')
      expect(adapters.ssh.revoke).not.toHaveBeenCalled()
    })

    it('should refuse to lock an expired account', async () => {
      const { controller } = setup([buildAccount({ state: 'expired' })])

      await expect(controller.lock('u1')).rejects.toBeInstanceOf(ConflictError)
    })

    it('should report a missing account as NotFound', async () => {
      const { controller } = setup([])

      await expect(controller.lock('nobody')).rejects.toBeInstanceOf(
        NotFoundError,
      )
    })
  })

  describe('unlock', () => {
    it('should apply and reactivate a locked account', async () => {
      const { controller } = setup([
        buildAccount({ state: 'locked', lockReason: 'manual' }),
      ])

      const view = await controller.unlock('u1')

      expect(view.state).toBe('active')
      expect(view.lockReason).toBeNull()
      expect(adapters.ssh.apply).toHaveBeenCalledTimes(1)
    })

    it('should do nothing for an active account', async () => {
      const { controller } = setup()

      await controller.unlock('u1')

      expect(adapters.ssh.apply).not.toHaveBeenCalled()
    })

    it('should refuse to unlock an expired account', async () => {
      const { controller } = setup([buildAccount({ state: 'expired' })])

      await expect(controller.unlock('u1')).rejects.toThrow(
        'Cannot unlock an account that is expired; renew it instead',
      )
      expect(adapters.ssh.apply).not.toHaveBeenCalled()
    })
  })

  describe('expire', () => {
    it('should revoke an active account and mark it expired', async () => {
      const { controller } = setup()

      const view = await controller.expire('u1')

      expect(view.state).toBe('expired')
      expect(adapters.ssh.revoke).toHaveBeenCalledWith('u1', { disconnect: true })
    })

    it('should not revoke a locked account again', async () => {
      const { controller } = setup([
        buildAccount({ state: 'locked', lockReason: 'manual' }),
      ])

      const view = await controller.expire('u1')

      expect(view.state).toBe('expired')
      expect(view.lockReason).toBeNull()
      expect(adapters.ssh.revoke).not.toHaveBeenCalled()
    })
  })

  describe('renew', () => {
    it('should reactivate an expired account for 30 more days', async () => {
      const { controller, rows } = setup([
        buildAccount({
          state: 'expired',
          expiresAt: new Date(NOW.getTime() - DAY_MS),
          usageBytes: 5 * GB,
          usageLoginCount: 2,
          lastSampleBytes: 700,
        }),
      ])

      const view = await controller.renew('u1', { days: 30 })

      expect(view.state).toBe('active')
      expect(view.expiresAt).toBe(new Date(NOW.getTime() + 30 * DAY_MS).toISOString())
      expect(view.usageBytes).toBe(0)
      expect(view.usageLoginCount).toBe(0)
      expect(rows.get('u1')?.lastSampleBytes).toBe(700)
      expect(adapters.ssh.apply).toHaveBeenCalledTimes(1)
    })

    it('should extend from a deadline that is still in the future', async () => {
      const current = new Date(NOW.getTime() + 10 * DAY_MS)
      const { controller } = setup([buildAccount({ expiresAt: current })])

      const view = await controller.renew('u1', { days: 30 })

      expect(view.expiresAt).toBe(
        new Date(current.getTime() + 30 * DAY_MS).toISOString(),
      )
    })

    it('should re-apply the live record when the daemon rejects the renewal', async () => {
      const current = new Date(NOW.getTime() + 10 * DAY_MS)
      const seed = buildAccount({ expiresAt: current })
      const { controller, rows } = setup([seed])
      adapters.ssh.apply.mockRejectedValueOnce(
        new AdapterUnavailableError('usermod -U failed'),
      )

      await expect(controller.renew('u1', { days: 30 })).rejects.toThrow(
        'usermod -U failed',
      )

      expect(adapters.ssh.apply).toHaveBeenCalledTimes(2)
      expect(adapters.ssh.apply.mock.calls[1]?.[0]).toEqual(seed)
      expect(rows.get('u1')?.expiresAt).toEqual(current)
    })

    it('should lift a quota lock', async () => {
      const { controller } = setup([
        buildAccount({ state: 'locked', lockReason: 'quota', usageBytes: 2 * GB }),
      ])

      const view = await controller.renew('u1', { days: 30 })

      expect(view.state).toBe('active')
      expect(view.lockReason).toBeNull()
    })

    it('should keep a manual lock and leave the daemon alone', async () => {
      const { controller } = setup([
        buildAccount({ state: 'locked', lockReason: 'manual' }),
      ])

      const view = await controller.renew('u1', { days: 30 })

      expect(view.state).toBe('locked')
      expect(view.lockReason).toBe('manual')
      expect(adapters.ssh.apply).not.toHaveBeenCalled()
    })

    it('should keep usage when asked to', async () => {
      const { controller } = setup([buildAccount({ usageBytes: 123 })])

      const view = await controller.renew('u1', { days: 1, resetUsage: false })

      expect(view.usageBytes).toBe(123)
    })

    it('should reject a renewal without a valid period', async () => {
      const { controller } = setup()

      await expect(controller.renew('u1', {})).rejects.toBeInstanceOf(
        ValidationError,
      )
      await expect(controller.renew('u1', { days: 0 })).rejects.toBeInstanceOf(
        ValidationError,
      )
      await expect(
        controller.renew('u1', { expiresAt: new Date(NOW.getTime() - 1) }),
      ).rejects.toBeInstanceOf(ValidationError)
    })
  })

  describe('delete', () => {
    it('should purge from the daemon, then delete and keep an audit row', async () => {
      const { controller, rows, events } = setup()

      await controller.delete('u1')

      expect(adapters.ssh.revoke).toHaveBeenCalledWith('u1', {
        disconnect: true,
        purge: true,
      })
      expect(rows.has('u1')).toBe(false)
      expect(events.at(-1)).toEqual({
        id: 'u1',
        event: 'deleted',
        detail: expect.objectContaining({ id: 'u1', state: 'deleted' }),
      })
      await expect(controller.status('u1')).rejects.toBeInstanceOf(
        NotFoundError,
      )
    })

    it('should refuse to delete when revoke fails', async () => {
      adapters.ssh.revoke.mockRejectedValue(
        new AdapterUnavailableError('userdel failed'),
      )
      const { controller, rows } = setup([
        buildAccount({ state: 'locked', lockReason: 'manual' }),
      ])

      await expect(controller.delete('u1')).rejects.toBeInstanceOf(
        AdapterUnavailableError,
      )
      expect(rows.get('u1')?.state).toBe('locked')
    })

    it('should wrap unexpected adapter errors as AdapterUnavailable', async () => {
      adapters.ssh.revoke.mockRejectedValue(new Error('EACCES'))
      const { controller } = setup()

      await expect(controller.delete('u1')).rejects.toThrow(
        'ssh revoke for u1 failed: EACCES',
      )
    })
  })

  describe('list and status', () => {
    it('should filter and limit the listing', async () => {
      const { controller } = setup([
        buildAccount({ id: 'u1' }),
        buildAccount({ id: 'u2', state: 'locked', lockReason: 'manual' }),
        buildAccount({
          id: 'v1',
          protocol: 'vmess',
          credential: { kind: 'uuid', uuid: '9b2f7c1e-4a3d-4e5f-8a6b-1c2d3e4f5a6b' },
        }),
      ])

      const active = await controller.list({ state: 'active' })
      const firstSsh = await controller.list({ protocol: 'ssh', limit: 1 })

      expect(active.map((view) => view.id)).toEqual(['u1', 'v1'])
      expect(firstSsh.map((view) => view.id)).toEqual(['u1'])
    })

    it('should include the live session count', async () => {
      adapters.ssh.isOnline.mockResolvedValue({ sessions: 2, bytes: 10 })
      const { controller } = setup()

      const view = await controller.status('u1')

      expect(view.online).toBe(2)
    })

    it('should report online as null when the daemon cannot be asked', async () => {
      adapters.ssh.isOnline.mockRejectedValue(
        new AdapterUnavailableError('iptables missing'),
      )
      const { controller } = setup()

      const view = await controller.status('u1')

      expect(view.online).toBeNull()
    })
  })

  describe('setQuota', () => {
    it('should update only the limits that were given', async () => {
      const { controller } = setup([
        buildAccount({ quotaBytes: GB, quotaLoginCount: 2 }),
      ])

      const view = await controller.setQuota('u1', { quotaLoginCount: null })

      expect(view.quotaBytes).toBe(GB)
      expect(view.quotaLoginCount).toBeNull()
    })

    it('should reject negative limits', async () => {
      const { controller } = setup()

      await expect(
        controller.setQuota('u1', { quotaBytes: -1 }),
      ).rejects.toBeInstanceOf(ValidationError)
    })
  })

  describe('rotateCredential', () => {
    it('should issue and apply a new UUID', async () => {
      const original = '9b2f7c1e-4a3d-4e5f-8a6b-1c2d3e4f5a6b'
      const { controller, rows } = setup([
        buildAccount({
          id: 'v1',
          protocol: 'vless',
          credential: { kind: 'uuid', uuid: original },
        }),
      ])

      const result = await controller.rotateCredential('v1')

      expect(result.credential.uuid).toBeDefined()
      expect(result.credential.uuid).not.toBe(original)
      expect(rows.get('v1')?.credential).toEqual({
        kind: 'uuid',
        uuid: result.credential.uuid,
      })
      expect(adapters.vless.apply).toHaveBeenCalledTimes(1)
    })

    it('should put the old UUID back on the daemon when the new one is rejected', async () => {
      const original = '9b2f7c1e-4a3d-4e5f-8a6b-1c2d3e4f5a6b'
      const { controller, rows } = setup([
        buildAccount({
          id: 'v1',
          protocol: 'vless',
          credential: { kind: 'uuid', uuid: original },
        }),
      ])
      adapters.vless.apply.mockRejectedValueOnce(
        new AdapterUnavailableError('xray api adu failed'),
      )

      await expect(controller.rotateCredential('v1')).rejects.toBeInstanceOf(
        AdapterUnavailableError,
      )

      expect(adapters.vless.apply).toHaveBeenCalledTimes(2)
      expect(adapters.vless.apply.mock.calls[1]?.[0].credential).toEqual({
        kind: 'uuid',
        uuid: original,
      })
      expect(rows.get('v1')?.credential).toEqual({ kind: 'uuid', uuid: original })
    })

    it('should refuse to rotate the password of a locked SSH account', async () => {
      const { controller } = setup([
        buildAccount({ state: 'locked', lockReason: 'manual' }),
      ])

      await expect(controller.rotateCredential('u1')).rejects.toBeInstanceOf(
        ConflictError,
      )
    })

    it('should refuse to rotate OpenVPN certificates', async () => {
      const { controller } = setup([
        buildAccount({
          id: 'o1',
          protocol: 'openvpn',
          credential: {
            kind: 'certificate',
            commonName: 'o1',
            certificatePath: '/etc/openvpn/issued/o1.crt',
          },
        }),
      ])

      await expect(controller.rotateCredential('o1')).rejects.toBeInstanceOf(
        ValidationError,
      )
    })
  })

  describe('bulk operations', () => {
    it('should reconcile active accounts by applying and the rest by revoking', async () => {
      adapters.trojan.apply.mockRejectedValue(
        new AdapterUnavailableError('xray api down'),
      )
      const { controller } = setup([
        buildAccount({ id: 'u1' }),
        buildAccount({ id: 'u2', state: 'locked', lockReason: 'quota' }),
        buildAccount({
          id: 't1',
          protocol: 'trojan',
          credential: { kind: 'secret', secret: 'test-secret' },
        }),
      ])

      const report = await controller.reconcile()

      expect(report).toEqual({
        applied: 1,
        revoked: 1,
        pruned: 0,
        failed: [{ id: 't1', error: 'xray api down' }],
        interrupted: false,
      })
      expect(adapters.ssh.revoke).toHaveBeenCalledWith('u2', { disconnect: false })
    })

    it('should purge daemon identities that no account owns', async () => {
      adapters.l2tp.listManaged.mockResolvedValue(['ghost', 'l1', 'u1'])
      const { controller } = setup([
        buildAccount({ id: 'u1' }),
        buildAccount({
          id: 'l1',
          protocol: 'l2tp',
          credential: { kind: 'secret', secret: 'test-secret' },
        }),
      ])

      const report = await controller.reconcile()

      expect(report).toEqual({
        applied: 2,
        revoked: 0,
        pruned: 2,
        failed: [],
        interrupted: false,
      })
      expect(adapters.l2tp.revoke.mock.calls).toEqual([
        ['ghost', { disconnect: true, purge: true }],
        ['u1', { disconnect: true, purge: true }],
      ])
      expect(adapters.ssh.revoke).not.toHaveBeenCalled()
    })

    it('should skip pruning when reconcile is interrupted', async () => {
      adapters.l2tp.listManaged.mockResolvedValue(['ghost'])
      const { controller } = setup([buildAccount({ id: 'u1' })])
      const abort = new AbortController()
      abort.abort()

      const report = await controller.reconcile(abort.signal)

      expect(report.interrupted).toBe(true)
      expect(adapters.l2tp.listManaged).not.toHaveBeenCalled()
      expect(adapters.l2tp.revoke).not.toHaveBeenCalled()
    })

    it('should lock every active account over quota', async () => {
      const { controller, rows } = setup([
        buildAccount({ id: 'u1', quotaBytes: GB, usageBytes: 2 * GB }),
        buildAccount({ id: 'u2', quotaBytes: GB, usageBytes: GB / 2 }),
        buildAccount({ id: 'u3', quotaLoginCount: 1, usageLoginCount: 3 }),
      ])

      const report = await controller.lockOverQuota()

      expect(report).toEqual({ locked: ['u1', 'u3'], failed: [], interrupted: false })
      expect(rows.get('u1')?.lockReason).toBe('quota')
      expect(rows.get('u2')?.state).toBe('active')
    })

    it('should stop between accounts when aborted', async () => {
      const { controller } = setup([
        buildAccount({ id: 'u1', quotaBytes: GB, usageBytes: 2 * GB }),
      ])
      const abort = new AbortController()
      abort.abort()

      const report = await controller.lockOverQuota(abort.signal)

      expect(report).toEqual({ locked: [], failed: [], interrupted: true })
      expect(adapters.ssh.revoke).not.toHaveBeenCalled()
    })
  })

  describe('reportBreach', () => {
    const breach = {
      accountId: 'u1',
      usageBytes: 2 * GB,
      quotaBytes: GB,
      usageLoginCount: 0,
      quotaLoginCount: null,
      detectedAt: NOW,
    }

    it('should coalesce repeated breaches into one lock', async () => {
      const { controller, rows } = setup([
        buildAccount({ quotaBytes: GB, usageBytes: 2 * GB }),
      ])

      controller.reportBreach(breach)
      controller.reportBreach(breach)
      controller.reportBreach(breach)
      await controller.drainBreaches()

      expect(adapters.ssh.revoke).toHaveBeenCalledTimes(1)
      expect(adapters.ssh.revoke).toHaveBeenCalledWith('u1', { disconnect: false })
      expect(rows.get('u1')?.state).toBe('locked')
      expect(rows.get('u1')?.lockReason).toBe('quota')
    })

    it('should disconnect live sessions when configured to', async () => {
      const { controller } = setup(
        [buildAccount({ quotaBytes: GB, usageBytes: 2 * GB })],
        { breachAction: 'disconnect' },
      )

      controller.reportBreach(breach)
      await controller.drainBreaches()

      expect(adapters.ssh.revoke).toHaveBeenCalledWith('u1', { disconnect: true })
    })

    it('should skip a breach for an account renewed in the meantime', async () => {
      const { controller } = setup([buildAccount({ quotaBytes: GB, usageBytes: 0 })])

      controller.reportBreach(breach)
      await controller.drainBreaches()

      expect(adapters.ssh.revoke).not.toHaveBeenCalled()
    })
  })
})
