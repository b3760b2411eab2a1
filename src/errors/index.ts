/**
 * stream-bridge Error Handling Module
 *
 * Errors raised by the library itself, as opposed to errors relayed through
 * a stream. A value that a wrapped sequence yields as `Err(e)` or that a host
 * stream rejects with is opaque: it is passed along as-is and never wrapped in
 * one of these classes.
 *
 * Error Hierarchy:
 * - StreamBridgeError (base class)
 *   - LockError (a reader or writer could not be acquired)
 *   - ConfigurationError (invalid options or environment)
 *   - CancelledError (a sink operation lost a cancellation race)
 *   - InvalidStateError (operation on an adapter that already closed)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for stream-bridge operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',

  // Lock acquisition
  LOCKED = 'LOCKED',

  // Configuration
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_INPUT = 'INVALID_INPUT',

  // Lifecycle
  CANCELLED = 'CANCELLED',
  SINK_CLOSED = 'SINK_CLOSED',
  SINK_RELEASED = 'SINK_RELEASED',
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all stream-bridge errors.
 *
 * @example
 * ```typescript
 * throw new StreamBridgeError('Adapter misuse', ErrorCode.UNKNOWN, { adapter: 'reader' })
 * ```
 */
export class StreamBridgeError extends Error {
  override readonly name: string = 'StreamBridgeError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: unknown

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    if (cause !== undefined) {
      this.cause = cause
    }
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Lock Errors
// =============================================================================

export type LockKind = 'reader' | 'writer'

/**
 * Thrown synchronously when a reader or writer is requested from a stream that
 * is already locked. This is a caller error, never a stream-content error.
 */
export class LockError extends StreamBridgeError {
  override readonly name = 'LockError'

  constructor(kind: LockKind, cause?: unknown) {
    super(
      `Cannot acquire a ${kind}: the stream is already locked to another ${kind}`,
      ErrorCode.LOCKED,
      { kind },
      cause
    )
    Object.setPrototypeOf(this, LockError.prototype)
  }

  get kind(): LockKind {
    return this.context.kind === 'writer' ? 'writer' : 'reader'
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when options or environment variables fail validation.
 */
export class ConfigurationError extends StreamBridgeError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: { issues?: string[]; input?: string },
    cause?: unknown
  ) {
    super(
      message,
      context?.input !== undefined ? ErrorCode.INVALID_INPUT : ErrorCode.INVALID_CONFIG,
      context,
      cause
    )
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }

  /** Individual validation failures, one per offending field */
  get issues(): string[] {
    const issues = this.context.issues
    return Array.isArray(issues) ? issues.map(String) : []
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

/**
 * Error a sink operation rejects with when its cancellation token fires first.
 * The token's reason is kept on the error.
 */
export class CancelledError extends StreamBridgeError {
  override readonly name = 'CancelledError'

  constructor(operation: string, reason: unknown) {
    super(`Operation cancelled: ${operation}`, ErrorCode.CANCELLED, { operation, reason })
    Object.setPrototypeOf(this, CancelledError.prototype)
  }

  get reason(): unknown {
    return this.context.reason
  }
}

/**
 * Error thrown when an adapter is used after it reached a terminal state
 * that is not a failure (closed, or its lock released).
 */
export class InvalidStateError extends StreamBridgeError {
  override readonly name = 'InvalidStateError'

  constructor(
    message: string,
    code: ErrorCode.SINK_CLOSED | ErrorCode.SINK_RELEASED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context)
    Object.setPrototypeOf(this, InvalidStateError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isStreamBridgeError(error: unknown): error is StreamBridgeError {
  return error instanceof StreamBridgeError
}

export function isLockError(error: unknown): error is LockError {
  return error instanceof LockError ||
    (isStreamBridgeError(error) && error.code === ErrorCode.LOCKED)
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}

export function isInvalidStateError(error: unknown): error is InvalidStateError {
  return error instanceof InvalidStateError
}
