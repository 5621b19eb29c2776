/**
 * A parameter is missing or invalid, or a required capability is unavailable.
 * Raised before any network call.
 */
export class ConfigurationError extends Error {
  public readonly problems: readonly string[]

  constructor(message: string, options?: { problems?: string[]; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'ConfigurationError'
    this.problems = options?.problems ?? [message]
  }
}

/**
 * A session could not be established, authenticated, or used.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'ConnectionError'
  }
}

/**
 * A query or DDL statement was rejected.
 */
export class StatementError extends Error {
  public readonly statement: string

  constructor(message: string, statement: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'StatementError'
    this.statement = statement
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
