import { toDriverError } from '../database/errors.ts'
import { log } from '../plumbing/logger.ts'
import {
  SELECT_KEYSPACE_QUERY,
  buildCreateKeyspaceStatement,
  buildDropKeyspaceStatement,
} from './statements.ts'
import type {
  CqlResult,
  CqlSession,
  DesiredState,
  KeyspaceDefinition,
  KeyspaceRow,
} from './types.ts'

const runStatement = async (
  session: CqlSession,
  statement: string,
  params?: unknown[],
): Promise<CqlResult> => {
  try {
    return await session.execute(statement, params)
  } catch (error) {
    throw toDriverError(error, statement)
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const toReplication = (
  value: unknown,
): Record<string, string> | undefined => {
  if (!isRecord(value)) {
    return undefined
  }

  const replication: Record<string, string> = {}
  for (const [key, entry] of Object.entries(value)) {
    replication[key] = String(entry)
  }
  return replication
}

const toKeyspaceRow = (
  row: Record<string, unknown>,
): KeyspaceRow | undefined => {
  const keyspaceName = row.keyspace_name
  if (typeof keyspaceName !== 'string') {
    return undefined
  }

  return {
    keyspace_name: keyspaceName,
    durable_writes:
      typeof row.durable_writes === 'boolean' ? row.durable_writes : undefined,
    replication: toReplication(row.replication),
  }
}

/**
 * Reads the keyspace's row from system_schema. Never cached.
 */
export const getKeyspace = async (
  session: CqlSession,
  name: string,
): Promise<KeyspaceRow | undefined> => {
  const result = await runStatement(session, SELECT_KEYSPACE_QUERY, [name])
  const [row] = result.rows
  return row ? toKeyspaceRow(row) : undefined
}

// Strategy classes come back fully qualified, e.g.
// org.apache.cassandra.locator.SimpleStrategy
const shortClassName = (className: string): string =>
  className.slice(className.lastIndexOf('.') + 1)

/**
 * Lists the ways an existing keyspace differs from the definition. Only used
 * for reporting: drift is never corrected.
 */
export const describeDrift = (
  existing: KeyspaceRow,
  keyspace: KeyspaceDefinition,
): string[] => {
  const drift: string[] = []
  const replication = existing.replication

  if (replication) {
    const className = replication.class
    if (className && shortClassName(className) !== keyspace.topology) {
      drift.push(`topology is ${shortClassName(className)}`)
    }

    const factorKey =
      keyspace.topology === 'SimpleStrategy'
        ? 'replication_factor'
        : keyspace.datacenter
    const factor: string | undefined = replication[factorKey]
    if (factor !== String(keyspace.replicationFactor)) {
      drift.push(`${factorKey} is ${factor ?? 'unset'}`)
    }
  }

  if (
    existing.durable_writes !== undefined &&
    existing.durable_writes !== keyspace.durableWrites
  ) {
    drift.push(`durable_writes is ${existing.durable_writes}`)
  }

  return drift
}

export const ensurePresent = async (
  session: CqlSession,
  dryRun: boolean,
  keyspace: KeyspaceDefinition,
): Promise<boolean> => {
  const existing = await getKeyspace(session, keyspace.name)

  if (existing) {
    const drift = describeDrift(existing, keyspace)
    if (drift.length > 0) {
      log({
        message: 'Keyspace exists with different settings, leaving unchanged',
        keyspace: keyspace.name,
        drift,
      })
    }
    return false
  }

  // Validates the definition in check mode too
  const statement = buildCreateKeyspaceStatement(keyspace)
  if (dryRun) {
    return true
  }

  log({
    message: 'Creating keyspace',
    keyspace: keyspace.name,
    topology: keyspace.topology,
  })
  await runStatement(session, statement)

  const created = await getKeyspace(session, keyspace.name)
  if (!created) {
    log({
      message: 'Keyspace not visible after create',
      keyspace: keyspace.name,
    })
  }
  return created !== undefined
}

export const ensureAbsent = async (
  session: CqlSession,
  dryRun: boolean,
  name: string,
): Promise<boolean> => {
  const existing = await getKeyspace(session, name)
  if (!existing) {
    return false
  }

  if (!dryRun) {
    log({ message: 'Dropping keyspace', keyspace: name })
    await runStatement(session, buildDropKeyspaceStatement(name))
  }
  return true
}

export const reconcileKeyspace = async (
  session: CqlSession,
  desired: DesiredState,
  dryRun: boolean,
): Promise<boolean> => {
  switch (desired.state) {
    case 'present':
      return ensurePresent(session, dryRun, desired.keyspace)
    case 'absent':
      return ensureAbsent(session, dryRun, desired.name)
  }
}
