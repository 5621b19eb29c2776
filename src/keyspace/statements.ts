import { ConfigurationError } from '../plumbing/errors.ts'
import reservedKeywords from './reserved-keywords.json' with { type: 'json' }
import { TOPOLOGIES, type KeyspaceDefinition, type Topology } from './types.ts'

export const SELECT_KEYSPACE_QUERY =
  'SELECT * FROM system_schema.keyspaces WHERE keyspace_name = ? LIMIT 1;'

const MAX_KEYSPACE_NAME_LENGTH = 48
const KEYSPACE_NAME_PATTERN = /^\w+$/
const UNQUOTED_IDENTIFIER_PATTERN = /^[a-z][a-z0-9_]*$/
// Reserved CQL keywords are only valid as identifiers when quoted
const RESERVED_KEYWORDS = new Set<string>(reservedKeywords)

export const keyspaceNameProblem = (name: string): string | undefined => {
  if (name.length === 0) {
    return 'keyspace name must not be empty'
  }
  if (name.length > MAX_KEYSPACE_NAME_LENGTH) {
    return `keyspace name must be at most ${MAX_KEYSPACE_NAME_LENGTH} characters`
  }
  if (!KEYSPACE_NAME_PATTERN.test(name)) {
    return 'keyspace name may only contain letters, digits and underscores'
  }
  return undefined
}

export const isTopology = (value: unknown): value is Topology =>
  typeof value === 'string' && TOPOLOGIES.some((topology) => topology === value)

/**
 * Renders a keyspace name as a CQL identifier. Unquoted identifiers are folded
 * to lower case by Cassandra, so anything that is not already lower case is
 * double-quoted to keep the stored name equal to the requested one. Reserved
 * keywords are quoted as well.
 */
export const quoteKeyspaceName = (name: string): string => {
  const problem = keyspaceNameProblem(name)
  if (problem) {
    throw new ConfigurationError(problem)
  }

  return UNQUOTED_IDENTIFIER_PATTERN.test(name) && !RESERVED_KEYWORDS.has(name)
    ? name
    : `"${name}"`
}

export const quoteLiteral = (value: string): string =>
  `'${value.replaceAll("'", "''")}'`

const replicationMap = (keyspace: KeyspaceDefinition): string => {
  const factor = quoteLiteral(String(keyspace.replicationFactor))
  const strategy = quoteLiteral(keyspace.topology)

  if (keyspace.topology === 'SimpleStrategy') {
    return `{ 'class' : ${strategy}, 'replication_factor' : ${factor} }`
  }

  if (keyspace.datacenter.trim().length === 0) {
    throw new ConfigurationError(
      'datacenter is required for NetworkTopologyStrategy',
    )
  }
  return `{ 'class' : ${strategy}, ${quoteLiteral(keyspace.datacenter)} : ${factor} }`
}

export const buildCreateKeyspaceStatement = (
  keyspace: KeyspaceDefinition,
): string => {
  if (!isTopology(keyspace.topology)) {
    throw new ConfigurationError(
      `topology must be one of: ${TOPOLOGIES.join(', ')}`,
    )
  }
  if (
    !Number.isInteger(keyspace.replicationFactor) ||
    keyspace.replicationFactor < 1
  ) {
    throw new ConfigurationError(
      'replication_factor must be a positive integer',
    )
  }

  const name = quoteKeyspaceName(keyspace.name)
  const durableWrites = keyspace.durableWrites ? 'true' : 'false'

  return `CREATE KEYSPACE ${name} WITH REPLICATION = ${replicationMap(keyspace)} AND DURABLE_WRITES = ${durableWrites};`
}

export const buildDropKeyspaceStatement = (name: string): string =>
  `DROP KEYSPACE ${quoteKeyspaceName(name)}`
