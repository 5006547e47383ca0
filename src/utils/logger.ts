/**
 * Logger utility for geocell
 *
 * Coverings report cap hits, oversized estimates and polar queries
 * through this interface. Defaults to the noop logger; hosts switch it
 * to a console logger (or their own) at startup.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Console logger that drops messages below `minLevel`
 *
 * @example
 * ```typescript
 * // Only cap and estimate warnings
 * setLogger(createConsoleLogger('warn'))
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel)
  const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`[DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(`[INFO] ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`[WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`[ERROR] ${message}`, error, ...args)
      } else {
        console.error(`[ERROR] ${message}`, ...args)
      }
    },
  }
}

/**
 * Console logger at debug level
 */
export const consoleLogger: Logger = createConsoleLogger()

/**
 * Silently discards all log messages (the default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * setLogger(consoleLogger)
 *
 * // Or route covering diagnostics elsewhere
 * setLogger({
 *   debug: () => {},
 *   info: () => {},
 *   warn: (msg) => warnings.push(msg),
 *   error: (msg, err) => reportError(msg, err),
 * })
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Logger that prefixes every message with a component tag
 *
 * Resolves the global logger on each call, so loggers created at module
 * load still follow a later setLogger().
 *
 * @param component - Tag such as 'covering' or 'config'
 */
export function createLogger(component: string): Logger {
  const tag = `[${component}]`
  return {
    debug: (message, ...args) => logger.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => logger.info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => logger.warn(`${tag} ${message}`, ...args),
    error: (message, error, ...args) => logger.error(`${tag} ${message}`, error, ...args),
  }
}
