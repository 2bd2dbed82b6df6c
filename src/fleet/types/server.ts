export interface FleetServer {
  id: string
  /** Base URL of the server's HTTP API, e.g. https://vps-2.example.net:3000 */
  apiEndpoint: string
  /** The remote server's API_TOKEN */
  authToken: string
}

export interface FleetConfig {
  servers: FleetServer[]
  timeoutMs: number
}
