/**
 * Diagnostics for parsing and the executable
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'warn' | 'error'

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, warn: 1, error: 2 }

/**
 * Creates a logger writing to standard error, so result lines on standard
 * output stay untouched. Messages below `minLevel` are dropped.
 */
export function createConsoleLogger(minLevel: LogLevel = 'warn'): Logger {
  const write =
    (level: LogLevel) =>
    (message: string, context?: Record<string, unknown>) => {
      if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return
      const line = `[${level.toUpperCase()}] ${message}`
      if (context) console.error(line, context)
      else console.error(line)
    }

  return {
    debug: write('debug'),
    warn: write('warn'),
    error: write('error'),
  }
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return { debug: noop, warn: noop, error: noop }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(name: string, baseLogger: Logger): Logger {
  const prefix = `[${name}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    warn: (message, context) => baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}
