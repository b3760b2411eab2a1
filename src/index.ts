/**
 * stream-bridge - Adapters between async sequences and WHATWG streams
 *
 * @packageDocumentation
 */

// =============================================================================
// Streams
// =============================================================================

export * from './streams'

// =============================================================================
// Result & Sink Types
// =============================================================================

export {
  Ok,
  Err,
  isOk,
  isErr,
  isResult,
  unwrap,
  map,
  mapErr,
  type Result,
} from './types/result'

export type { AsyncSink } from './types/sink'

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  StreamBridgeError,
  LockError,
  ConfigurationError,
  CancelledError,
  InvalidStateError,
  isStreamBridgeError,
  isLockError,
  isConfigurationError,
  isCancelledError,
  isInvalidStateError,
  type LockKind,
} from './errors'

// =============================================================================
// Configuration & Logging
// =============================================================================

export {
  configure,
  configureFromEnv,
  getConfig,
  resetConfig,
  resolveQueuingStrategy,
  DEFAULT_CONFIG,
  type BridgeConfig,
  type QueuingOptions,
} from './config'

export {
  logger,
  setLogger,
  consoleLogger,
  createConsoleLogger,
  noopLogger,
  type ConsoleLoggerOptions,
  type Logger,
  type LogLevel,
} from './utils/logger'

export {
  fireAndForget,
  type FireAndForgetOperationType,
} from './utils/fire-and-forget'
