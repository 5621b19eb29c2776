import type { LoginSettings } from '../database/types/database-config.ts'
import { ConfigurationError } from '../plumbing/errors.ts'
import { parseBoolean, parseList } from '../plumbing/parse-env.ts'
import { isTopology, keyspaceNameProblem } from './statements.ts'
import {
  KEYSPACE_STATES,
  TOPOLOGIES,
  type DesiredState,
  type KeyspaceState,
} from './types.ts'

export type RawModuleParams = Record<string, unknown>

export interface ModuleParams {
  desired: DesiredState
  login: LoginSettings
  checkMode: boolean
}

export const DEFAULT_DATACENTER = 'datacenter1'
export const DEFAULT_REPLICATION_FACTOR = 1
export const DEFAULT_LOGIN_PORT = 9042

const SUPPORTED_PARAMS = new Set([
  'name',
  'keyspace',
  'topology',
  'datacenter',
  'replication_factor',
  'durable_writes',
  'login_hosts',
  'login_user',
  'login_password',
  'login_port',
  'state',
  'check_mode',
])

// Keys the configuration-management framework adds to every args file
const FRAMEWORK_PARAM_PREFIX = '_ansible_'
const FRAMEWORK_CHECK_MODE_PARAM = '_ansible_check_mode'

/**
 * Drops framework-internal keys, carrying the framework's check-mode flag over
 * to check_mode unless check_mode is set explicitly.
 */
export const withoutFrameworkParams = (
  raw: RawModuleParams,
): RawModuleParams => {
  const params: RawModuleParams = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(FRAMEWORK_PARAM_PREFIX)) {
      params[key] = value
    }
  }

  const frameworkCheckMode = raw[FRAMEWORK_CHECK_MODE_PARAM]
  if (params.check_mode === undefined && frameworkCheckMode !== undefined) {
    params.check_mode = frameworkCheckMode
  }
  return params
}

const isKeyspaceState = (value: unknown): value is KeyspaceState =>
  typeof value === 'string' && KEYSPACE_STATES.some((state) => state === value)

/**
 * Accumulates problems so that one ConfigurationError reports all of them.
 */
class ParamReader {
  readonly problems: string[] = []

  constructor(private readonly raw: RawModuleParams) {}

  has(key: string): boolean {
    return this.raw[key] !== undefined && this.raw[key] !== null
  }

  string(key: string): string | undefined {
    const value = this.raw[key]
    if (value === undefined || value === null) {
      return undefined
    }
    if (typeof value === 'string') {
      return value
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value)
    }
    this.problems.push(`${key} must be a string`)
    return undefined
  }

  requiredString(key: string): string {
    if (!this.has(key)) {
      this.problems.push(`missing required parameter: ${key}`)
      return ''
    }
    return this.string(key) ?? ''
  }

  integer(key: string, fallback: number): number {
    const value = this.raw[key]
    if (value === undefined || value === null || value === '') {
      return fallback
    }

    const parsed = typeof value === 'string' ? Number(value.trim()) : value
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
      this.problems.push(`${key} must be an integer`)
      return fallback
    }
    return parsed
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key]
    if (value === undefined || value === null) {
      return fallback
    }
    if (typeof value === 'boolean') {
      return value
    }

    const parsed =
      typeof value === 'string' || typeof value === 'number'
        ? parseBoolean(String(value))
        : undefined
    if (parsed === undefined) {
      this.problems.push(`${key} must be a boolean`)
      return fallback
    }
    return parsed
  }

  list(key: string): string[] {
    const value = this.raw[key]
    if (value === undefined || value === null) {
      this.problems.push(`missing required parameter: ${key}`)
      return []
    }
    if (typeof value === 'string') {
      return parseList(value)
    }
    if (
      Array.isArray(value) &&
      value.every((entry): entry is string => typeof entry === 'string')
    ) {
      return value.map((entry) => entry.trim()).filter((entry) => entry !== '')
    }
    this.problems.push(`${key} must be a list of strings`)
    return []
  }
}

/**
 * Turns the untyped parameter bag into a validated ModuleParams. Every problem
 * is reported at once; nothing here touches the network.
 */
export const parseModuleParams = (
  rawParams: RawModuleParams,
): ModuleParams => {
  const raw = withoutFrameworkParams(rawParams)
  const reader = new ParamReader(raw)

  for (const key of Object.keys(raw)) {
    if (!SUPPORTED_PARAMS.has(key)) {
      reader.problems.push(`unsupported parameter: ${key}`)
    }
  }

  const nameKey =
    !reader.has('name') && reader.has('keyspace') ? 'keyspace' : 'name'
  const name = reader.requiredString(nameKey)
  const nameProblem = reader.has(nameKey) ? keyspaceNameProblem(name) : undefined
  if (nameProblem) {
    reader.problems.push(nameProblem)
  }

  const topology = reader.requiredString('topology')
  if (reader.has('topology') && !isTopology(topology)) {
    reader.problems.push(`topology must be one of: ${TOPOLOGIES.join(', ')}`)
  }

  const datacenter = reader.string('datacenter') ?? DEFAULT_DATACENTER
  if (topology === 'NetworkTopologyStrategy' && datacenter.trim() === '') {
    reader.problems.push('datacenter is required for NetworkTopologyStrategy')
  }

  const replicationFactor = reader.integer(
    'replication_factor',
    DEFAULT_REPLICATION_FACTOR,
  )
  if (replicationFactor < 1) {
    reader.problems.push('replication_factor must be a positive integer')
  }

  const durableWrites = reader.boolean('durable_writes', true)

  const state = reader.string('state') ?? 'present'
  if (!isKeyspaceState(state)) {
    reader.problems.push(`state must be one of: ${KEYSPACE_STATES.join(', ')}`)
  }

  const hosts = reader.list('login_hosts')
  if (reader.has('login_hosts') && hosts.length === 0) {
    reader.problems.push('login_hosts must name at least one host')
  }
  const user = reader.requiredString('login_user')
  const password = reader.requiredString('login_password')
  const port = reader.integer('login_port', DEFAULT_LOGIN_PORT)
  if (port < 1 || port > 65_535) {
    reader.problems.push('login_port must be between 1 and 65535')
  }

  const checkMode = reader.boolean('check_mode', false)

  if (reader.problems.length > 0 || !isTopology(topology)) {
    throw new ConfigurationError(
      `Module parameter validation failed:\n${reader.problems.join('\n')}`,
      { problems: reader.problems },
    )
  }

  const desired: DesiredState =
    state === 'absent'
      ? { state: 'absent', name }
      : {
          state: 'present',
          keyspace: {
            name,
            topology,
            datacenter,
            replicationFactor,
            durableWrites,
          },
        }

  return {
    desired,
    login: { hosts, port, user, password },
    checkMode,
  }
}
