import { parseNumber } from '../plumbing/parse-env.ts'
import type { DatabaseConfig, LoginSettings } from './types/database-config.ts'

export const getDatabaseConfig = (login: LoginSettings): DatabaseConfig => {
  const localDataCenter =
    process.env.CASSANDRA_LOCAL_DATACENTER || 'datacenter1'
  const isSslEnabled = process.env.CASSANDRA_SSL === 'true'
  const connectTimeoutMs = parseNumber(
    process.env.CASSANDRA_CONNECT_TIMEOUT_MS,
    10_000,
  )

  // An empty login_user means an unauthenticated session
  const hasCredentials = login.user.length > 0

  return {
    hosts: login.hosts,
    port: login.port,
    localDataCenter,
    username: hasCredentials ? login.user : undefined,
    password: hasCredentials ? login.password : undefined,
    isSslEnabled,
    connectTimeoutMs,
  }
}
