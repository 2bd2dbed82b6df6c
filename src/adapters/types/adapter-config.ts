export type BreachAction = 'disconnect' | 'block-new'

export interface SshAdapterConfig {
  shell: string
  /** iptables chain holding one owner-match accounting rule per account */
  accountingChain: string
}

export interface XrayAdapterConfig {
  binary: string
  apiServer: string
  inboundTags: {
    vmess: string
    vless: string
    trojan: string
  }
  /** Optional VLESS flow, e.g. xtls-rprx-vision */
  vlessFlow?: string
}

export interface OpenVpnAdapterConfig {
  clientConfigDir: string
  statusPath: string
  managementHost: string
  managementPort: number
  certificateDir: string
}

export interface L2tpAdapterConfig {
  fragmentsDir: string
  chapSecretsPath: string
  serverName: string
  /** Command run once per debounced burst, split on whitespace */
  reloadCommand: string[]
  /** ip-up hook writes one file per ppp interface: "<peer> <pid>" */
  sessionsDir: string
  sysfsNetDir: string
}

export interface AdapterConfig {
  timeoutMs: number
  reloadDebounceMs: number
  breachAction: BreachAction
  ssh: SshAdapterConfig
  xray: XrayAdapterConfig
  openvpn: OpenVpnAdapterConfig
  l2tp: L2tpAdapterConfig
}
