/**
 * Logger used by the UUID engine for startup diagnostics.
 */
export interface Logger {
  logDebug(message: string, meta?: unknown): void
  logInfo(message: string, meta?: unknown): void
  logWarn(message: string, meta?: unknown): void
  logError(message: string, error?: unknown): void
}

export interface LoggerOptions {
  /** Emit logDebug output. Off by default. */
  debug?: boolean
  prefix?: string
}

/**
 * Console-backed logger. Debug output is off unless requested.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { debug = false, prefix = "[uuid]" } = options

  return {
    logDebug: (message, meta) => {
      if (debug) {
        console.debug(`${prefix} [DEBUG] ${message}`, meta ?? "")
      }
    },
    logInfo: (message, meta) => {
      console.info(`${prefix} [INFO] ${message}`, meta ?? "")
    },
    logWarn: (message, meta) => {
      console.warn(`${prefix} [WARN] ${message}`, meta ?? "")
    },
    logError: (message, error) => {
      console.error(`${prefix} [ERROR] ${message}`, error ?? "")
    },
  }
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  logDebug: () => undefined,
  logInfo: () => undefined,
  logWarn: () => undefined,
  logError: () => undefined,
}
