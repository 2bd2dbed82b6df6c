import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { buildAccount } from '../../../tests/support/accounts.ts'
import * as clientModule from '../../database/client.ts'
import { NotFoundError, ValidationError } from '../../plumbing/errors.ts'
import {
  getAccount,
  insertAccount,
  listAccounts,
  mapRowToAccount,
  parseCredential,
  putAccount,
} from '../storage.ts'

const mockExecute = vi.fn()

vi.mock('../../database/client.ts', () => ({
  getDatabaseClient: vi.fn(),
}))

vi.mock('../../database/config.ts', () => ({
  getDatabaseConfig: vi.fn(() => ({
    keyspace: 'tunnel_accounts',
    fetchSize: 2,
  })),
}))

const CREATED_AT = new Date('2026-01-01T00:00:00.000Z')

const buildRow = (overrides: Record<string, unknown> = {}) => ({
  account_id: 'u1',
  protocol: 'ssh',
  credential: JSON.stringify({
    kind: 'password-hash',
    hash: 'test-hash',
    salt: 'test-salt',
  }),
  quota_bytes: null,
  quota_login_count: null,
  usage_bytes: 0,
  usage_login_count: 0,
  last_sample_bytes: 0,
  expires_at: null,
  state: 'active',
  lock_reason: null,
  created_at: CREATED_AT,
  updated_at: CREATED_AT,
  ...overrides,
})

const collect = async <T>(iterable: AsyncIterable<T>): Promise<T[]> => {
  const items: T[] = []
  for await (const item of iterable) items.push(item)
  return items
}

describe('Account Storage', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(clientModule.getDatabaseClient).mockReturnValue({
      execute: mockExecute,
    } as never)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('mapRowToAccount', () => {
    it('should convert driver Long values and dates', () => {
      const account = mapRowToAccount(
        buildRow({
          quota_bytes: { toNumber: () => 10_737_418_240 },
          usage_bytes: { toNumber: () => 42 },
          lock_reason: 'quota',
          state: 'locked',
        }),
      )

      expect(account).toEqual(
        buildAccount({
          quotaBytes: 10_737_418_240,
          usageBytes: 42,
          state: 'locked',
          lockReason: 'quota',
        }),
      )
    })

    it('should reject rows with an unknown protocol', () => {
      expect(() => mapRowToAccount(buildRow({ protocol: 'pptp' }))).toThrow(
        'Corrupt account row: u1',
      )
    })
  })

  describe('parseCredential', () => {
    it('should parse a certificate credential', () => {
      expect(
        parseCredential(
          JSON.stringify({
            kind: 'certificate',
            commonName: 'u1',
            certificatePath: '/etc/openvpn/issued/u1.crt',
          }),
        ),
      ).toEqual({
        kind: 'certificate',
        commonName: 'u1',
        certificatePath: '/etc/openvpn/issued/u1.crt',
      })
    })

    it('should reject an unknown kind', () => {
      expect(() =>
        parseCredential(JSON.stringify({ kind: 'token' })),
      ).toThrow('Unknown credential kind: token')
    })
  })

  describe('putAccount', () => {
    it('should store the credential as JSON text', async () => {
      mockExecute.mockResolvedValue({ rows: [] })

      await putAccount(buildAccount())

      const [query, params] = mockExecute.mock.calls[0] ?? []
      expect(query).toContain('INSERT INTO tunnel_accounts.accounts')
      expect(query).not.toContain('IF NOT EXISTS')
      expect(params).toEqual([
        'u1',
        'ssh',
        '{"kind":"password-hash","hash":"test-hash","salt":"test-salt"}',
        null,
        null,
        0,
        0,
        0,
        null,
        'active',
        null,
        CREATED_AT,
        CREATED_AT,
      ])
    })

    it('should refuse a deleted state without touching the database', async () => {
      await expect(
        putAccount(buildAccount({ state: 'deleted' })),
      ).rejects.toBeInstanceOf(ValidationError)
      expect(mockExecute).not.toHaveBeenCalled()
    })
  })

  describe('insertAccount', () => {
    it('should return whether the lightweight transaction applied', async () => {
      mockExecute.mockResolvedValue({ rows: [], wasApplied: () => false })

      const inserted = await insertAccount(buildAccount())

      expect(inserted).toBe(false)
      expect(mockExecute.mock.calls[0]?.[0]).toContain('IF NOT EXISTS')
    })
  })

  describe('getAccount', () => {
    it('should return the mapped account', async () => {
      mockExecute.mockResolvedValue({ rows: [buildRow()] })

      expect(await getAccount('u1')).toEqual(buildAccount())
    })

    it('should throw NotFoundError when the row is missing', async () => {
      mockExecute.mockResolvedValue({ rows: [] })

      await expect(getAccount('u9')).rejects.toBeInstanceOf(NotFoundError)
    })

    it('should reject an invalid id before querying', async () => {
      await expect(getAccount('Bad Id')).rejects.toBeInstanceOf(ValidationError)
      expect(mockExecute).not.toHaveBeenCalled()
    })
  })

  describe('listAccounts', () => {
    it('should follow page state and apply the filter', async () => {
      mockExecute
        .mockResolvedValueOnce({
          rows: [
            buildRow({ account_id: 'u1' }),
            buildRow({ account_id: 'u2', state: 'locked', lock_reason: 'manual' }),
          ],
          pageState: 'page-2',
        })
        .mockResolvedValueOnce({
          rows: [buildRow({ account_id: 'u3' })],
          pageState: null,
        })

      const accounts = await collect(listAccounts({ state: 'active' }))

      expect(accounts.map((account) => account.id)).toEqual(['u1', 'u3'])
      expect(mockExecute).toHaveBeenCalledTimes(2)
      expect(mockExecute.mock.calls[1]?.[2]).toEqual({
        prepare: true,
        fetchSize: 2,
        pageState: 'page-2',
      })
    })

    it('should query again on every iteration', async () => {
      mockExecute.mockResolvedValue({ rows: [buildRow()], pageState: null })
      const accounts = listAccounts()

      await collect(accounts)
      await collect(accounts)

      expect(mockExecute).toHaveBeenCalledTimes(2)
    })
  })
})
