export interface DatabaseConfig {
  hosts: string[]
  port: number
  localDataCenter: string
  username?: string
  password?: string
  isSslEnabled: boolean
  connectTimeoutMs: number
}

/**
 * Connection settings supplied as module parameters rather than environment.
 */
export interface LoginSettings {
  hosts: string[]
  port: number
  user: string
  password: string
}
