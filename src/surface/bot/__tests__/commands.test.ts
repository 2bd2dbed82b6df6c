import { describe, expect, it, vi } from 'vitest'
import { buildAccount } from '../../../../tests/support/accounts.ts'
import {
  createTestOperations,
  TEST_NOW,
} from '../../../../tests/support/operations.ts'
import type { Account } from '../../../accounts/types/account.ts'
import { log } from '../../../plumbing/logger.ts'
import { createBotHandler, parseCommand } from '../commands.ts'

vi.mock('../../../plumbing/logger.ts', () => ({
  log: vi.fn(),
  errorMessage: (error: unknown) =>
    error instanceof Error ? error.message : String(error),
}))

const ADMIN = '1001'

const setup = (seed: Account[] = []) => {
  const context = createTestOperations(seed)
  const handle = createBotHandler({
    operations: context.operations,
    adminIds: [ADMIN],
    now: () => TEST_NOW,
  })
  const send = (text: string, userId = ADMIN) => handle({ userId, text })
  return { ...context, send }
}

describe('Bot commands', () => {
  describe('parseCommand', () => {
    it('should strip the bot name and split arguments', () => {
      expect(parseCommand('  /Lock@TunnelBot  alice ')).toEqual({
        command: 'lock',
        args: ['alice'],
      })
    })

    it('should return null for plain text', () => {
      expect(parseCommand('hello')).toBeNull()
    })
  })

  it('should refuse users outside the admin list and audit the attempt', async () => {
    const { send, adapters } = setup([buildAccount()])

    expect(await send('/lock u1', '999')).toBe('Unauthorized access.')
    expect(adapters.ssh.revoke).not.toHaveBeenCalled()
    expect(vi.mocked(log)).toHaveBeenCalledWith({
      message: 'Audit event',
      audit_event: {
        event: 'surface_auth_failure',
        surface: 'bot',
        reason: 'user 999 is not an admin',
      },
    })
  })

  it('should answer /start with the bot name suffix', async () => {
    const { send } = setup()

    expect(await send('/start@TunnelBot')).toBe(
      'Welcome. Use /help to see available commands.',
    )
  })

  it('should point plain text at /help', async () => {
    const { send } = setup()

    expect(await send('hello')).toBe('Use /help to see available commands.')
  })

  it('should add a password account and show the credential once', async () => {
    const { send, rows } = setup()

    const reply = await send('/adduser alice ssh test-secret 1GB 30')

    expect(reply).toBe(
      [
        'Added alice (ssh)',
        'Password: test-secret',
        'Quota: 1 GB',
        'Expires: 2026-11-18',
      ].join('\n'),
    )
    expect(rows.get('alice')?.quotaBytes).toBe(1_073_741_824)
  })

  it('should read the quota as the third argument for uuid protocols', async () => {
    const { send, rows } = setup()

    const reply = await send('/adduser bob vless 10GB')

    expect(reply).toContain('Quota: 10 GB')
    expect(reply).toContain('Expires: never')
    expect(rows.get('bob')?.quotaBytes).toBe(10_737_418_240)
    expect(rows.get('bob')?.credential.kind).toBe('uuid')
  })

  it('should read a size in the password slot as the quota', async () => {
    const { send, rows } = setup()

    const reply = await send('/adduser carol ssh 10GB')

    expect(reply).toContain('Quota: 10 GB')
    expect(reply).toMatch(/^Password: \S+$/m)
    expect(rows.get('carol')?.quotaBytes).toBe(10_737_418_240)
  })

  it('should accept quota= and days= keywords', async () => {
    const { send, rows } = setup()

    const reply = await send('/adduser dave trojan quota=2GB days=7')

    expect(reply).toContain('Expires: 2026-10-26')
    expect(rows.get('dave')?.quotaBytes).toBe(2_147_483_648)
  })

  it('should show usage for extra /adduser arguments', async () => {
    const { send, rows } = setup()

    expect(await send('/adduser erin ssh test-secret 1GB 30 extra')).toBe(
      'Invalid request: Usage: /adduser <id> <protocol> [password] [quota] [days]',
    )
    expect(rows.has('erin')).toBe(false)
  })

  it('should list accounts with usage and expiry', async () => {
    const { send } = setup([
      buildAccount({ id: 'u1' }),
      buildAccount({
        id: 'u2',
        protocol: 'trojan',
        credential: { kind: 'secret', secret: 'test-secret' },
        quotaBytes: 1_073_741_824,
        usageBytes: 536_870_912,
        expiresAt: new Date('2026-12-01T00:00:00.000Z'),
      }),
    ])

    expect(await send('/listuser')).toBe(
      [
        'Accounts:',
        'u1 | ssh | active | 0 B / unlimited | expires never',
        'u2 | trojan | active | 512 MB / 1 GB | expires 2026-12-01',
      ].join('\n'),
    )
  })

  it('should say so when no accounts match', async () => {
    const { send } = setup([buildAccount()])

    expect(await send('/listuser vmess')).toBe('No accounts found.')
  })

  it('should report the system status', async () => {
    const { send } = setup()

    expect(await send('/status')).toBe(
      [
        'Services:',
        '  xray: active',
        'Database: healthy',
        'Accounts: 1 active, 0 locked, 0 expired',
      ].join('\n'),
    )
  })

  it('should report one account with its lock reason', async () => {
    const { send } = setup([
      buildAccount({ state: 'locked', lockReason: 'quota' }),
    ])

    expect(await send('/status u1')).toBe(
      [
        'u1 | ssh | locked | 0 B / unlimited | expires never',
        'Online sessions: 0',
        'Lock reason: quota',
      ].join('\n'),
    )
  })

  it('should lock an account', async () => {
    const { send, rows } = setup([buildAccount()])

    expect(await send('/lock u1')).toBe('u1 is now locked')
    expect(rows.get('u1')?.lockReason).toBe('manual')
  })

  it('should explain an illegal transition', async () => {
    const { send } = setup([buildAccount({ state: 'expired' })])

    expect(await send('/unlock u1')).toBe(
      'Not allowed right now: Cannot unlock an account that is expired; renew it instead',
    )
  })

  it('should renew an account by days', async () => {
    const { send } = setup([buildAccount({ state: 'expired' })])

    expect(await send('/renew u1 30')).toBe(
      'u1 renewed until 2026-11-18 (active)',
    )
  })

  it('should show usage when arguments are missing', async () => {
    const { send } = setup([buildAccount()])

    expect(await send('/renew u1')).toBe(
      'Invalid request: Usage: /renew <id> <days>',
    )
  })

  it('should report a missing account', async () => {
    const { send } = setup()

    expect(await send('/deluser u9')).toBe('Not found: Account not found: u9')
  })

  it('should delete an account', async () => {
    const { send, rows } = setup([buildAccount()])

    expect(await send('/deluser u1')).toBe('Deleted u1')
    expect(rows.has('u1')).toBe(false)
  })

  it('should refuse restore names outside the backup pattern', async () => {
    const { send } = setup()

    expect(await send('/restore ../../etc/passwd')).toBe(
      'Invalid request: Backup file must be a name like backup_YYYYMMDD_HHMMSS.json',
    )
  })

  it('should hide internal error details', async () => {
    const { send, systemStatus } = setup()
    systemStatus.mockRejectedValue(new Error('socket hang up'))

    expect(await send('/status')).toBe('Something went wrong')
  })

  it('should answer unknown commands with a hint', async () => {
    const { send } = setup()

    expect(await send('/ban u1')).toBe(
      'Unknown command /ban. Use /help to see available commands.',
    )
  })
})
