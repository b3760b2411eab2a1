/**
 * Sequence helpers
 *
 * Conversions between plain async iterables and sequences of Results.
 *
 * @module streams/sequence
 */

import { Ok, Err, type Result } from '../types/result'
import { settle } from './settle'
import { pollOnce, toIterator, type Sequence } from './poll'

/**
 * Wrap each item of an iterable as `Ok(item)`. If iterating throws, the thrown
 * value is yielded once as `Err` and the sequence ends.
 *
 * @example
 * ```typescript
 * const stream = readableFromSequence(resultsOf(['a', 'b']))
 * ```
 */
export async function* resultsOf<T>(
  source: AsyncIterable<T> | Iterable<T>
): AsyncGenerator<Result<T>, void, undefined> {
  try {
    for await (const item of source) {
      yield Ok(item)
    }
  } catch (error) {
    yield Err(error)
  }
}

/**
 * Iterate the items of a sequence, throwing its first `Err` value.
 *
 * Leaving the loop early, or an `Err`, drops the underlying sequence.
 */
export async function* unwrapResults<T, E>(
  sequence: Sequence<T, E>
): AsyncGenerator<T, void, undefined> {
  const iterator = toIterator(sequence)
  let ended = false
  try {
    for (;;) {
      const polled = await pollOnce(iterator)
      if (polled === undefined) {
        ended = true
        return
      }
      if (!polled.ok) {
        throw polled.error
      }
      yield polled.value
    }
  } finally {
    if (!ended && iterator.return) {
      await iterator.return()
    }
  }
}

/**
 * Read a sequence to its end. Resolves with every item, or with the first
 * error the sequence produced.
 *
 * @example
 * ```typescript
 * const result = await collectSequence(sequenceFromReadable(stream))
 * if (result.ok) console.log(result.value)
 * ```
 */
export function collectSequence<T, E>(sequence: Sequence<T, E>): Promise<Result<T[]>> {
  return settle((async () => {
    const items: T[] = []
    for await (const item of unwrapResults(sequence)) {
      items.push(item)
    }
    return items
  })())
}
