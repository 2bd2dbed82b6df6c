import type { Client } from 'cassandra-driver'

export interface Migration {
  version: string
  name: string
  description: string
  up: (client: Client) => Promise<void>
  down: (client: Client) => Promise<void>
}

export interface MigrationStatus {
  version: string
  name: string
  applied: boolean
  appliedAt?: Date
  rolledBackAt?: Date
}
