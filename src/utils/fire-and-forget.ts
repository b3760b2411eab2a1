/**
 * Fire-and-Forget Error Handler
 *
 * Some background work is not awaited by the operation that starts it:
 *
 * - dropping an iterator whose `next()` is still pending
 * - the abort of a writer after a cancellation
 * - a lock release deferred until a read settles
 * - the pipe feeding a transform pair, whose failure reaches the caller
 *   through the pair's readable side
 *
 * Their failures are logged and never propagate.
 *
 * @module utils/fire-and-forget
 */

import { logger } from './logger'

/**
 * Kind of background operation, used in log messages
 */
export type FireAndForgetOperationType =
  | 'sequence-drop'
  | 'writer-abort'
  | 'deferred-release'
  | 'pipe-through'

/**
 * Execute an operation without blocking the caller. `context` is attached to
 * the log entry of its outcome.
 *
 * @example
 * ```typescript
 * fireAndForget('sequence-drop', async () => {
 *   await iterator.return?.()
 * })
 * ```
 */
export function fireAndForget(
  operation: FireAndForgetOperationType,
  fn: () => Promise<unknown>,
  context?: Record<string, unknown>
): void {
  let execution: Promise<unknown>
  try {
    execution = fn()
  } catch (err) {
    execution = Promise.reject(err)
  }

  execution.then(
    () => {
      logger.debug(`${operation} completed`, context)
    },
    (err: unknown) => {
      logger.warn(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`, context)
    }
  )
}
