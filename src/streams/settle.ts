/**
 * Opaque error passthrough
 *
 * Host promises reject with arbitrary values. Every host completion the
 * adapters await goes through `settle`, which turns a rejection into
 * `Err(value)` with the value untouched, so that errors crossing the boundary
 * are relayed rather than re-thrown, wrapped or narrowed.
 *
 * @module streams/settle
 */

import { Err, Ok, type Result } from '../types/result'

/**
 * Await a promise and capture its outcome as a Result. Never rejects.
 */
export function settle<T>(promise: PromiseLike<T>): Promise<Result<T>> {
  return Promise.resolve(promise).then(
    (value) => Ok(value),
    (error: unknown) => Err(error)
  )
}

/**
 * Call a function that may throw synchronously or return a rejecting promise,
 * capturing either failure as `Err`.
 */
export function settleCall<T>(fn: () => T | PromiseLike<T>): Promise<Result<T>> {
  try {
    return settle(Promise.resolve(fn()))
  } catch (error) {
    return Promise.resolve(Err(error))
  }
}

/**
 * Marker for a failure that must be reported on every later call. Boxed so
 * that `undefined` can be relayed as an error value too.
 */
export interface StickyFailure {
  readonly error: unknown
}
