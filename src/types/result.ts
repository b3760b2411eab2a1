/**
 * Result Type
 *
 * The item type of every sequence this library produces or consumes. A
 * sequence yields `Ok(item)` for each chunk and `Err(error)` for a failure;
 * the error is whatever value the producer supplied, relayed untouched.
 *
 * @example
 * ```typescript
 * async function* numbers(): AsyncGenerator<Result<number, string>> {
 *   yield Ok(1)
 *   yield Err('boom')
 * }
 *
 * for await (const result of numbers()) {
 *   if (isOk(result)) console.log(result.value)
 *   else console.error(result.error)
 * }
 * ```
 */

// =============================================================================
// Core Result Type
// =============================================================================

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error. Defaults to `unknown`, since errors
 *   crossing a stream boundary are opaque.
 */
export type Result<T, E = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: E }

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing the given value.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing the given error.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// =============================================================================
// Type Guards
// =============================================================================

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

/**
 * Check whether an arbitrary value has the shape of a Result
 */
export function isResult(value: unknown): value is Result<unknown, unknown> {
  if (value === null || typeof value !== 'object' || !('ok' in value)) {
    return false
  }
  return (value.ok === true && 'value' in value) || (value.ok === false && 'error' in value)
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Extracts the value from a Result, throwing the contained error if it is an Err.
 *
 * @example
 * ```typescript
 * unwrap(Ok(42)) // 42
 * unwrap(Err('fail')) // throws 'fail'
 * ```
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error
}

/**
 * Applies a function to the value inside an Ok Result, leaving Err unchanged.
 *
 * Useful for converting sequence items before handing the sequence to
 * {@link readableFromSequence}.
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (isOk(result)) {
    return Ok(fn(result.value))
  }
  return result
}

/**
 * Applies a function to the error inside an Err Result, leaving Ok unchanged.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  if (isErr(result)) {
    return Err(fn(result.error))
  }
  return result
}
