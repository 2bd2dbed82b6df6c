import { log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-env.ts'
import type { AdapterConfig, BreachAction } from './types/adapter-config.ts'

let cachedConfig: AdapterConfig | null = null

const parseBreachAction = (value: string | undefined): BreachAction => {
  if (value === undefined || value === '') return 'block-new'
  if (value === 'disconnect' || value === 'block-new') return value
  throw new Error(
    `QUOTA_BREACH_ACTION must be "disconnect" or "block-new", got "${value}"`,
  )
}

const parseHostPort = (
  value: string,
  fallbackPort: number,
): { host: string; port: number } => {
  const separator = value.lastIndexOf(':')
  if (separator === -1) {
    return { host: value, port: fallbackPort }
  }
  return {
    host: value.slice(0, separator),
    port: parseNumber(value.slice(separator + 1), fallbackPort),
  }
}

const validateConfig = (config: AdapterConfig): void => {
  const errors: string[] = []

  if (config.timeoutMs <= 0) {
    errors.push('ADAPTER_TIMEOUT_MS must be positive')
  }
  if (config.reloadDebounceMs < 0) {
    errors.push('RELOAD_DEBOUNCE_MS must not be negative')
  }
  if (!/^[A-Za-z0-9_-]{1,28}$/.test(config.ssh.accountingChain)) {
    errors.push('SSH_ACCOUNTING_CHAIN must be a valid iptables chain name')
  }
  if (config.l2tp.reloadCommand.length === 0) {
    errors.push('L2TP_RELOAD_COMMAND must not be empty')
  }

  if (errors.length > 0) {
    throw new Error(
      `Adapter configuration validation failed:\n${errors.join('\n')}`,
    )
  }
}

export const getAdapterConfig = (): AdapterConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const management = parseHostPort(
    process.env.OPENVPN_MANAGEMENT || '127.0.0.1:7505',
    7505,
  )

  const config: AdapterConfig = {
    timeoutMs: parseNumber(process.env.ADAPTER_TIMEOUT_MS, 5_000),
    reloadDebounceMs: parseNumber(process.env.RELOAD_DEBOUNCE_MS, 1_500),
    breachAction: parseBreachAction(process.env.QUOTA_BREACH_ACTION),
    ssh: {
      shell: process.env.SSH_SHELL || '/bin/false',
      accountingChain: process.env.SSH_ACCOUNTING_CHAIN || 'TUNNEL_ACCT',
    },
    xray: {
      binary: process.env.XRAY_BIN || '/usr/local/bin/xray',
      apiServer: process.env.XRAY_API_SERVER || '127.0.0.1:10085',
      inboundTags: {
        vmess: process.env.XRAY_VMESS_TAG || 'vmess',
        vless: process.env.XRAY_VLESS_TAG || 'vless',
        trojan: process.env.XRAY_TROJAN_TAG || 'trojan',
      },
      vlessFlow: process.env.XRAY_VLESS_FLOW || undefined,
    },
    openvpn: {
      clientConfigDir: process.env.OPENVPN_CCD_DIR || '/etc/openvpn/ccd',
      statusPath:
        process.env.OPENVPN_STATUS_PATH || '/etc/openvpn/openvpn-status.log',
      managementHost: management.host,
      managementPort: management.port,
      certificateDir:
        process.env.OPENVPN_CERT_DIR || '/etc/openvpn/easy-rsa/pki/issued',
    },
    l2tp: {
      fragmentsDir:
        process.env.L2TP_FRAGMENTS_DIR || '/etc/ppp/chap-secrets.d',
      chapSecretsPath:
        process.env.L2TP_CHAP_SECRETS_PATH || '/etc/ppp/chap-secrets',
      serverName: process.env.L2TP_SERVER_NAME || 'l2tpd',
      reloadCommand: (process.env.L2TP_RELOAD_COMMAND || 'ipsec rereadsecrets')
        .split(/\s+/)
        .filter((part) => part.length > 0),
      sessionsDir: process.env.L2TP_SESSIONS_DIR || '/run/tunnel-accounts/ppp',
      sysfsNetDir: process.env.SYSFS_NET_DIR || '/sys/class/net',
    },
  }

  validateConfig(config)

  if (config.breachAction === 'block-new') {
    log('Quota breaches block new logins; live sessions are left running')
  }

  cachedConfig = config
  return config
}

export const clearAdapterConfigCache = (): void => {
  cachedConfig = null
}
