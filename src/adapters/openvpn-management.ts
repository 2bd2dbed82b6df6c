import net from 'node:net'
import { AdapterUnavailableError } from '../plumbing/errors.ts'

export interface ManagementEndpoint {
  host: string
  port: number
  timeoutMs: number
}

/**
 * Send one command to the OpenVPN management interface and resolve with its
 * SUCCESS:/ERROR: reply line. Real-time notifications (">...") are skipped.
 */
export const sendManagementCommand = (
  endpoint: ManagementEndpoint,
  command: string,
): Promise<string> =>
  new Promise((resolve, reject) => {
    const socket = net.createConnection({
      host: endpoint.host,
      port: endpoint.port,
    })
    let buffer = ''
    let settled = false

    const finish = (error: Error | null, reply?: string) => {
      if (settled) return
      settled = true
      socket.destroy()
      if (error) {
        reject(error)
      } else {
        resolve(reply ?? '')
      }
    }

    socket.setEncoding('utf8')
    socket.setTimeout(endpoint.timeoutMs)

    socket.on('connect', () => {
      socket.write(`${command}\n`)
    })

    socket.on('data', (chunk: string) => {
      buffer += chunk
      const lines = buffer.split('\n')
      buffer = lines.pop() ?? ''
      for (const raw of lines) {
        const line = raw.trim()
        if (line.startsWith('SUCCESS:') || line.startsWith('ERROR:')) {
          socket.write('quit\n')
          finish(null, line)
          return
        }
      }
    })

    socket.on('timeout', () => {
      finish(
        new AdapterUnavailableError(
          `OpenVPN management interface timed out after ${endpoint.timeoutMs}ms`,
        ),
      )
    })

    socket.on('error', (error) => {
      finish(
        new AdapterUnavailableError(
          `OpenVPN management interface unreachable at ${endpoint.host}:${endpoint.port}`,
          { cause: error },
        ),
      )
    })

    socket.on('close', () => {
      finish(
        new AdapterUnavailableError(
          'OpenVPN management interface closed the connection without a reply',
        ),
      )
    })
  })
