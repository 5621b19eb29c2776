export const TOPOLOGIES = ['SimpleStrategy', 'NetworkTopologyStrategy'] as const

export type Topology = (typeof TOPOLOGIES)[number]

export const KEYSPACE_STATES = ['present', 'absent'] as const

export type KeyspaceState = (typeof KEYSPACE_STATES)[number]

export interface KeyspaceDefinition {
  name: string
  topology: Topology
  // Only used by NetworkTopologyStrategy
  datacenter: string
  replicationFactor: number
  durableWrites: boolean
}

export type DesiredState =
  | { state: 'present'; keyspace: KeyspaceDefinition }
  | { state: 'absent'; name: string }

/**
 * A row of system_schema.keyspaces as returned by the driver.
 */
export interface KeyspaceRow {
  keyspace_name: string
  durable_writes?: boolean
  replication?: Record<string, string>
}

export interface CqlResult {
  rows: ReadonlyArray<Record<string, unknown>>
}

/**
 * The slice of a driver session the reconciler needs. A connected
 * cassandra-driver Client satisfies it.
 */
export interface CqlSession {
  execute(query: string, params?: unknown[]): Promise<CqlResult>
}

export type ModuleResult =
  | { changed: boolean; name: string }
  | { failed: true; msg: string }
