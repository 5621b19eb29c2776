import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogValue = string | number | boolean | object | undefined

export type LogRecord = {
  message: string
  [key: string]: LogValue
}

/**
 * Writes a structured record to stderr. Stdout is reserved for the module
 * result record.
 */
export const log = (message: string | LogRecord): void => {
  let logMessage: LogRecord & { app: string; version: string }
  if (typeof message === 'string') {
    logMessage = {
      message,
      app: name,
      version,
    }
  } else {
    logMessage = {
      ...message,
      app: name,
      version,
    }
  }
  console.error(logMessage)
}
