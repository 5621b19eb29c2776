import type * as CassandraDriver from 'cassandra-driver'
import { ConfigurationError } from '../plumbing/errors.ts'

export type CassandraDriverModule = typeof CassandraDriver

/**
 * Capability check for the Cassandra driver. Runs once at startup, before any
 * connection attempt.
 */
export const loadCassandraDriver = async (): Promise<CassandraDriverModule> => {
  try {
    return await import('cassandra-driver')
  } catch (error) {
    throw new ConfigurationError('the cassandra-driver module is required', {
      cause: error,
    })
  }
}
