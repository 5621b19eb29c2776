import {
  ConnectionError,
  StatementError,
  errorMessage,
} from '../plumbing/errors.ts'

// Driver errors raised for a statement the cluster (or the driver's own
// argument checks) refused. Everything else means the session is unusable.
const STATEMENT_ERROR_NAMES = new Set(['ResponseError', 'ArgumentError'])

export const toDriverError = (
  error: unknown,
  statement: string,
): ConnectionError | StatementError => {
  if (error instanceof ConnectionError || error instanceof StatementError) {
    return error
  }

  const message = errorMessage(error)
  if (error instanceof Error && STATEMENT_ERROR_NAMES.has(error.name)) {
    return new StatementError(message, statement, { cause: error })
  }

  return new ConnectionError(message, { cause: error })
}
