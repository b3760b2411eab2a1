/**
 * Configuration
 *
 * Global defaults for the queuing strategies the adapters hand to the host,
 * validation of per-adapter queuing options, and overrides read from the
 * environment.
 *
 * The readable default high-water mark is 0: a stream built from a sequence
 * asks for an item only when a read is waiting, leaving any buffering to the
 * sequence itself. The writable default is the host's own default of 1.
 *
 * @module config
 */

import { z } from 'zod'
import type { QueuingStrategy } from 'node:stream/web'
import { ConfigurationError } from '../errors'
import { consoleLogger, createConsoleLogger, setLogger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface BridgeConfig {
  /** High-water mark for streams created by `readableFromSequence` */
  readableHighWaterMark: number
  /** High-water mark for streams created by `writableFromSink` */
  writableHighWaterMark: number
}

/**
 * Queuing options accepted by the adapters that construct host streams.
 * Enforced by the host; the adapters only pass them through.
 */
export interface QueuingOptions<T> {
  /** Size of the host queue, in units of `size(chunk)` */
  highWaterMark?: number | undefined
  /** Size of one chunk; each chunk counts as 1 when omitted */
  size?: ((chunk: T) => number) | undefined
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_CONFIG: Readonly<BridgeConfig> = Object.freeze({
  readableHighWaterMark: 0,
  writableHighWaterMark: 1,
})

let current: BridgeConfig = { ...DEFAULT_CONFIG }

// =============================================================================
// Schemas
// =============================================================================

const highWaterMarkSchema = z.number({ invalid_type_error: 'must be a number' })
  .nonnegative('must not be negative')

const sizeSchema = z.custom<(chunk: unknown) => number>(
  (value) => typeof value === 'function',
  { message: 'must be a function' }
)

const QueuingOptionsSchema = z.object({
  highWaterMark: highWaterMarkSchema.optional(),
  size: sizeSchema.optional(),
})

const BridgeConfigSchema = z.object({
  readableHighWaterMark: highWaterMarkSchema.optional(),
  writableHighWaterMark: highWaterMarkSchema.optional(),
}).strict()

const EnvSchema = z.object({
  STREAM_BRIDGE_DEBUG: z.enum(['1', '0', 'true', 'false']).optional(),
  STREAM_BRIDGE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  STREAM_BRIDGE_READABLE_HWM: z.coerce.number().nonnegative().optional(),
  STREAM_BRIDGE_WRITABLE_HWM: z.coerce.number().nonnegative().optional(),
})

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

// =============================================================================
// Global Configuration
// =============================================================================

/**
 * Get the current global defaults
 */
export function getConfig(): Readonly<BridgeConfig> {
  return current
}

/**
 * Override some of the global defaults
 *
 * @example
 * ```typescript
 * configure({ readableHighWaterMark: 16 })
 * ```
 */
export function configure(partial: Partial<BridgeConfig>): Readonly<BridgeConfig> {
  const parsed = BridgeConfigSchema.safeParse(partial)
  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues })
  }

  current = {
    readableHighWaterMark: parsed.data.readableHighWaterMark ?? current.readableHighWaterMark,
    writableHighWaterMark: parsed.data.writableHighWaterMark ?? current.writableHighWaterMark,
  }
  return current
}

/**
 * Restore the built-in defaults
 */
export function resetConfig(): void {
  current = { ...DEFAULT_CONFIG }
}

/**
 * Apply overrides from environment variables:
 *
 * - `STREAM_BRIDGE_DEBUG` (`1`/`true`) switches the global logger to the console
 * - `STREAM_BRIDGE_LOG_LEVEL` does the same, dropping entries below that level;
 *   it takes precedence over `STREAM_BRIDGE_DEBUG`
 * - `STREAM_BRIDGE_READABLE_HWM` sets `readableHighWaterMark`
 * - `STREAM_BRIDGE_WRITABLE_HWM` sets `writableHighWaterMark`
 */
export function configureFromEnv(
  env: Record<string, string | undefined> = process.env
): Readonly<BridgeConfig> {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, { issues })
  }

  const vars = parsed.data
  if (vars.STREAM_BRIDGE_LOG_LEVEL !== undefined) {
    setLogger(createConsoleLogger({ level: vars.STREAM_BRIDGE_LOG_LEVEL }))
  } else if (vars.STREAM_BRIDGE_DEBUG === '1' || vars.STREAM_BRIDGE_DEBUG === 'true') {
    setLogger(consoleLogger)
  }

  const overrides: Partial<BridgeConfig> = {}
  if (vars.STREAM_BRIDGE_READABLE_HWM !== undefined) {
    overrides.readableHighWaterMark = vars.STREAM_BRIDGE_READABLE_HWM
  }
  if (vars.STREAM_BRIDGE_WRITABLE_HWM !== undefined) {
    overrides.writableHighWaterMark = vars.STREAM_BRIDGE_WRITABLE_HWM
  }
  return configure(overrides)
}

// =============================================================================
// Queuing Strategy Resolution
// =============================================================================

/**
 * Validate per-adapter queuing options and fill in the global default
 * high-water mark.
 *
 * @throws ConfigurationError when `highWaterMark` is negative or not a number,
 *   or `size` is not a function
 */
export function resolveQueuingStrategy<T>(
  options: QueuingOptions<T> | undefined,
  defaultHighWaterMark: number
): QueuingStrategy<T> {
  const parsed = QueuingOptionsSchema.safeParse(options ?? {})
  if (!parsed.success) {
    const issues = formatIssues(parsed.error)
    throw new ConfigurationError(`Invalid queuing strategy: ${issues.join('; ')}`, { issues })
  }

  const strategy: QueuingStrategy<T> = {
    highWaterMark: options?.highWaterMark ?? defaultHighWaterMark,
  }
  if (options?.size) {
    strategy.size = options.size
  }
  return strategy
}
