import type { Client, ClientOptions } from 'cassandra-driver'
import { log } from '../plumbing/logger.ts'
import { ConnectionError, errorMessage } from '../plumbing/errors.ts'
import type { CassandraDriverModule } from './driver.ts'
import type { DatabaseConfig } from './types/database-config.ts'

let databaseClient: Client | null = null

const toContactPoints = (config: DatabaseConfig): string[] =>
  config.hosts.map((host) => `${host}:${config.port}`)

export const buildClientOptions = (config: DatabaseConfig): ClientOptions => ({
  contactPoints: toContactPoints(config),
  localDataCenter: config.localDataCenter,
  credentials:
    config.username && config.password !== undefined
      ? {
          username: config.username,
          password: config.password,
        }
      : undefined,
  sslOptions: config.isSslEnabled
    ? {
        // rejectUnauthorized defaults to true for security
        rejectUnauthorized: true,
      }
    : undefined,
  socketOptions: {
    connectTimeout: config.connectTimeoutMs,
  },
})

const closeFailedClient = async (client: Client): Promise<void> => {
  try {
    await client.shutdown()
  } catch (shutdownError) {
    log({
      message: 'Error shutting down failed client',
      error: errorMessage(shutdownError),
    })
  }
}

const connectionFailure = (error: unknown): ConnectionError => {
  log({
    message: 'Failed to connect to database',
    error: errorMessage(error),
  })
  return new ConnectionError(
    `unable to connect to cassandra, check login_user and login_password are correct. Exception message: ${errorMessage(error)}`,
    { cause: error },
  )
}

// The driver validates options in its constructor
const createClient = (
  driver: CassandraDriverModule,
  config: DatabaseConfig,
): Client => {
  try {
    return new driver.Client(buildClientOptions(config))
  } catch (error) {
    throw connectionFailure(error)
  }
}

/**
 * Opens the single session used for the run. There is no retry: a failed
 * connection attempt is reported as a ConnectionError.
 */
export const initializeDatabase = async (
  driver: CassandraDriverModule,
  config: DatabaseConfig,
): Promise<Client> => {
  if (databaseClient) {
    log('Database client already initialized')
    return databaseClient
  }

  const client = createClient(driver, config)
  try {
    await client.connect()
  } catch (error) {
    await closeFailedClient(client)
    throw connectionFailure(error)
  }

  databaseClient = client
  log({
    message: 'Database connection established',
    hosts: toContactPoints(config),
    localDataCenter: config.localDataCenter,
    authenticated: config.username !== undefined,
  })

  return client
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null

  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      error: errorMessage(error),
    })
  }
}
