import type { Protocol } from '../accounts/types/account.ts'
import { createL2tpAdapter } from './l2tp.ts'
import { createOpenVpnAdapter } from './openvpn.ts'
import { createSshAdapter } from './ssh.ts'
import type { CommandRunner, ProtocolAdapter } from './types/adapter.ts'
import type { AdapterConfig } from './types/adapter-config.ts'
import { createXrayAdapter } from './xray.ts'

export type AdapterRegistry = Record<Protocol, ProtocolAdapter>

/**
 * The closed set of adapters, one per protocol. Adding a protocol means adding
 * a key here; the Record type makes a missing one a compile error.
 */
export const createAdapters = (
  config: AdapterConfig,
  run: CommandRunner,
): AdapterRegistry => ({
  ssh: createSshAdapter(config.ssh, run),
  vmess: createXrayAdapter('vmess', config.xray, run),
  vless: createXrayAdapter('vless', config.xray, run),
  trojan: createXrayAdapter('trojan', config.xray, run),
  openvpn: createOpenVpnAdapter(config.openvpn, config.timeoutMs),
  l2tp: createL2tpAdapter(config.l2tp, run, config.reloadDebounceMs),
})

export const closeAdapters = async (adapters: AdapterRegistry): Promise<void> => {
  for (const adapter of Object.values(adapters)) {
    if (adapter.close) {
      await adapter.close()
    }
  }
}
