/**
 * Single-item poll translation
 *
 * The host drives a source by callback, one `pull` at a time; a sequence is
 * driven by calling `next()`. {@link pollOnce} is the bridge between the two:
 * exactly one `next()` call, with every way that call can end folded into
 * "item", "error" or "end".
 *
 * @module streams/poll
 */

import { Err, isResult, type Result } from '../types/result'
import { settleCall } from './settle'

/**
 * A pull-based async sequence of results: either an iterable or the iterator
 * it produces. An `Err` item, or a rejected `next()`, is a failure; iterator
 * completion is the end of the sequence.
 */
export type Sequence<T, E = unknown> =
  | AsyncIterable<Result<T, E>>
  | AsyncIterator<Result<T, E>>

/**
 * Get the iterator of a sequence. Called once, when an adapter takes
 * ownership of the sequence.
 */
export function toIterator<T, E>(sequence: Sequence<T, E>): AsyncIterator<Result<T, E>> {
  if (Symbol.asyncIterator in sequence) {
    return sequence[Symbol.asyncIterator]()
  }
  return sequence
}

/**
 * Poll an iterator exactly once.
 *
 * Resolves with the item's Result, or `undefined` when the sequence has
 * ended. A `next()` that throws or rejects resolves to `Err` with the thrown
 * value. Never rejects.
 */
export async function pollOnce<T, E>(
  iterator: AsyncIterator<Result<T, E>>
): Promise<Result<T, E | unknown> | undefined> {
  const polled = await settleCall(() => iterator.next())
  if (!polled.ok) {
    return Err(polled.error)
  }

  const step = polled.value
  if (step.done) {
    return undefined
  }
  if (!isResult(step.value)) {
    return Err(new TypeError('Sequence yielded a value that is not a Result'))
  }
  return step.value
}
