import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { buildAccount } from '../../../tests/support/accounts.ts'
import { createFakeRunner } from '../../../tests/support/fake-runner.ts'
import { AdapterUnavailableError } from '../../plumbing/errors.ts'
import {
  CHAP_SECRETS_HEADER,
  createL2tpAdapter,
  formatChapLine,
  parseSessionFile,
} from '../l2tp.ts'

const l2tpAccount = (id: string, secret: string) =>
  buildAccount({ id, protocol: 'l2tp', credential: { kind: 'secret', secret } })

describe('L2TP adapter', () => {
  let root: string

  const configFor = () => ({
    fragmentsDir: path.join(root, 'chap-secrets.d'),
    chapSecretsPath: path.join(root, 'chap-secrets'),
    serverName: 'l2tpd',
    reloadCommand: ['ipsec', 'rereadsecrets'],
    sessionsDir: path.join(root, 'sessions'),
    sysfsNetDir: path.join(root, 'net'),
  })

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'l2tp-test-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('should format a quoted CHAP line', () => {
    expect(formatChapLine('u1', 'l2tpd', 'test-secret')).toBe(
      '"u1"\tl2tpd\t"test-secret"\t*\n',
    )
  })

  it('should parse session files and ignore malformed ones', () => {
    expect(parseSessionFile('ppp0', 'u1 4242\n')).toEqual({
      iface: 'ppp0',
      peer: 'u1',
      pid: 4242,
    })
    expect(parseSessionFile('ppp1', 'u1\n')).toBeNull()
  })

  it('should assemble chap-secrets from fragments and reload once per burst', async () => {
    const fake = createFakeRunner()
    const adapter = createL2tpAdapter(configFor(), fake.run, 100)

    await Promise.all([
      adapter.apply(l2tpAccount('u2', 'test-secret-2')),
      adapter.apply(l2tpAccount('u1', 'test-secret-1')),
    ])

    const secrets = await readFile(configFor().chapSecretsPath, 'utf8')
    expect(secrets).toBe(
      CHAP_SECRETS_HEADER +
        formatChapLine('u1', 'l2tpd', 'test-secret-1') +
        formatChapLine('u2', 'l2tpd', 'test-secret-2'),
    )
    expect(fake.commandLines()).toEqual(['ipsec rereadsecrets'])
  })

  it('should drop the peer from chap-secrets on revoke', async () => {
    const fake = createFakeRunner()
    const adapter = createL2tpAdapter(configFor(), fake.run, 0)

    await adapter.apply(l2tpAccount('u1', 'test-secret'))
    await adapter.revoke('u1')

    const secrets = await readFile(configFor().chapSecretsPath, 'utf8')
    expect(secrets).toBe(CHAP_SECRETS_HEADER)
    expect(fake.commandLines()).toEqual([
      'ipsec rereadsecrets',
      'ipsec rereadsecrets',
    ])
  })

  it('should fail the change when the reload command fails', async () => {
    const fake = createFakeRunner(() => ({ exitCode: 1, stderr: 'no charon' }))
    const adapter = createL2tpAdapter(configFor(), fake.run, 0)

    await expect(
      adapter.apply(l2tpAccount('u1', 'test-secret')),
    ).rejects.toBeInstanceOf(AdapterUnavailableError)
  })

  it('should take a new peer back out when its reload fails', async () => {
    let reloads = 0
    const fake = createFakeRunner(() => {
      reloads += 1
      return reloads === 1 ? { exitCode: 1, stderr: 'no charon' } : undefined
    })
    const config = configFor()
    const adapter = createL2tpAdapter(config, fake.run, 0)

    await expect(
      adapter.apply(l2tpAccount('ghost', 'ghost-secret')),
    ).rejects.toBeInstanceOf(AdapterUnavailableError)

    expect(await readdir(config.fragmentsDir)).toEqual([])
    expect(await readFile(config.chapSecretsPath, 'utf8')).toBe(CHAP_SECRETS_HEADER)

    await adapter.apply(l2tpAccount('other', 'other-secret'))

    expect(await readdir(config.fragmentsDir)).toEqual(['other'])
    expect(await readFile(config.chapSecretsPath, 'utf8')).toBe(
      CHAP_SECRETS_HEADER + formatChapLine('other', 'l2tpd', 'other-secret'),
    )
  })

  it('should keep the previous secret when an update fails to reload', async () => {
    let reloads = 0
    const fake = createFakeRunner(() => {
      reloads += 1
      return reloads === 2 ? { exitCode: 1, stderr: 'no charon' } : undefined
    })
    const config = configFor()
    const adapter = createL2tpAdapter(config, fake.run, 0)

    await adapter.apply(l2tpAccount('u1', 'test-secret-1'))
    await expect(
      adapter.apply(l2tpAccount('u1', 'test-secret-2')),
    ).rejects.toBeInstanceOf(AdapterUnavailableError)

    expect(await readFile(path.join(config.fragmentsDir, 'u1'), 'utf8')).toBe(
      formatChapLine('u1', 'l2tpd', 'test-secret-1'),
    )
    expect(await readFile(config.chapSecretsPath, 'utf8')).toBe(
      CHAP_SECRETS_HEADER + formatChapLine('u1', 'l2tpd', 'test-secret-1'),
    )
  })

  it('should keep the peer when a revoke fails to reload', async () => {
    let reloads = 0
    const fake = createFakeRunner(() => {
      reloads += 1
      return reloads === 2 ? { exitCode: 1, stderr: 'no charon' } : undefined
    })
    const config = configFor()
    const adapter = createL2tpAdapter(config, fake.run, 0)

    await adapter.apply(l2tpAccount('u1', 'test-secret'))
    await expect(adapter.revoke('u1')).rejects.toBeInstanceOf(
      AdapterUnavailableError,
    )

    expect(await readdir(config.fragmentsDir)).toEqual(['u1'])
  })

  it('should list the peers that have a fragment', async () => {
    const adapter = createL2tpAdapter(configFor(), createFakeRunner().run, 0)

    await expect(adapter.listManaged()).resolves.toEqual([])

    await adapter.apply(l2tpAccount('u2', 'test-secret-2'))
    await adapter.apply(l2tpAccount('u1', 'test-secret-1'))

    await expect(adapter.listManaged()).resolves.toEqual(['u1', 'u2'])
  })

  it('should terminate the peer pppd processes on disconnect', async () => {
    const config = configFor()
    await mkdir(config.sessionsDir, { recursive: true })
    await writeFile(path.join(config.sessionsDir, 'ppp0'), 'u1 4242\n')
    await writeFile(path.join(config.sessionsDir, 'ppp1'), 'u2 5353\n')
    const fake = createFakeRunner()
    const adapter = createL2tpAdapter(config, fake.run, 0)

    await adapter.revoke('u1', { disconnect: true })

    expect(fake.commandLines()).toEqual([
      'ipsec rereadsecrets',
      'kill -TERM 4242',
    ])
  })

  it('should report sessions and interface byte counters', async () => {
    const config = configFor()
    await mkdir(config.sessionsDir, { recursive: true })
    await writeFile(path.join(config.sessionsDir, 'ppp0'), 'u1 4242\n')
    const stats = path.join(config.sysfsNetDir, 'ppp0', 'statistics')
    await mkdir(stats, { recursive: true })
    await writeFile(path.join(stats, 'rx_bytes'), '1200\n')
    await writeFile(path.join(stats, 'tx_bytes'), '800\n')
    const adapter = createL2tpAdapter(config, createFakeRunner().run, 0)

    await expect(adapter.isOnline('u1')).resolves.toEqual({
      sessions: 1,
      bytes: 2000,
    })
    await expect(adapter.isOnline('u2')).resolves.toEqual({
      sessions: 0,
      bytes: 0,
    })
  })

  it('should run a pending reload on close', async () => {
    const fake = createFakeRunner()
    const adapter = createL2tpAdapter(configFor(), fake.run, 60_000)

    const applied = adapter.apply(l2tpAccount('u1', 'test-secret'))
    // let the fragment write reach the reloader
    await new Promise((resolve) => setTimeout(resolve, 50))
    await adapter.close?.()
    await applied

    expect(fake.commandLines()).toEqual(['ipsec rereadsecrets'])
  })
})
