import { parseList } from '../plumbing/parse-env.ts'

const DEFAULT_SERVICES = ['sshd', 'xray', 'openvpn', 'xl2tpd', 'strongswan']

export interface SystemConfig {
  /** systemd units reported by the status command */
  monitoredServices: string[]
}

export const getSystemConfig = (): SystemConfig => {
  const services = parseList(process.env.MONITORED_SERVICES)
  return {
    monitoredServices: services.length > 0 ? services : DEFAULT_SERVICES,
  }
}
