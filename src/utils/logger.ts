/**
 * Logger utility for stream-bridge
 *
 * Adapters report lifecycle transitions (close, error, cancel, lock release)
 * at debug level and abandoned background work at warn level. Silent by
 * default; switch to a console logger with `setLogger(consoleLogger)`, or with
 * the `STREAM_BRIDGE_DEBUG` and `STREAM_BRIDGE_LOG_LEVEL` environment
 * variables.
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface ConsoleLoggerOptions {
  /** Least severe level written; defaults to `debug` */
  level?: LogLevel | undefined
  /** Defaults to `[stream-bridge]` */
  prefix?: string | undefined
}

/**
 * Console logger that drops entries below `level`
 *
 * @example
 * ```typescript
 * setLogger(createConsoleLogger({ level: 'warn' }))
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? 'debug']
  const prefix = options.prefix ?? '[stream-bridge]'
  const enabled = (level: LogLevel): boolean => SEVERITY[level] >= threshold

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`${prefix} [DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(`${prefix} [INFO] ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`${prefix} [WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (error !== undefined) {
        console.error(`${prefix} [ERROR] ${message}`, error, ...args)
      } else {
        console.error(`${prefix} [ERROR] ${message}`, ...args)
      }
    },
  }
}

/**
 * Console logger writing every level
 */
export const consoleLogger: Logger = createConsoleLogger()

/**
 * Noop logger implementation (default)
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
 * import { setLogger, consoleLogger } from 'stream-bridge'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
