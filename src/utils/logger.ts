/**
 * Logging seam shared by the planner, analyzer and store-backed services
 * @module utils/logger
 */

/**
 * Logger interface accepted by every component that reports progress
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Console logger with level prefixes
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Creates a no-op logger. Components fall back to this when the host
 * does not supply one.
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(
  componentName: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${componentName}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}

/**
 * Creates a logger that drops messages below `minLevel`
 */
export function createLevelLogger(minLevel: LogLevel, baseLogger: Logger): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]
  return {
    debug: (message, context) => {
      if (enabled('debug')) baseLogger.debug(message, context)
    },
    info: (message, context) => {
      if (enabled('info')) baseLogger.info(message, context)
    },
    warn: (message, context) => {
      if (enabled('warn')) baseLogger.warn(message, context)
    },
    error: (message, context) => {
      if (enabled('error')) baseLogger.error(message, context)
    },
  }
}
