/**
 * Sequence → host readable stream
 *
 * Wraps a {@link Sequence} as the underlying source of a host
 * `ReadableStream`. The host decides when to pull; each pull polls the
 * sequence exactly once, so the host's queuing strategy alone governs how
 * far ahead of the consumer the sequence runs.
 *
 * @module streams/sequence-source
 */

import { ReadableStream } from 'node:stream/web'
import type { ReadableStreamDefaultController } from 'node:stream/web'
import type { Result } from '../types/result'
import { getConfig, resolveQueuingStrategy, type QueuingOptions } from '../config'
import { logger } from '../utils/logger'
import { fireAndForget } from '../utils/fire-and-forget'
import { pollOnce, toIterator, type Sequence } from './poll'

export type ReadableFromSequenceOptions<T> = QueuingOptions<T>

/**
 * Underlying source that owns a sequence.
 *
 * The host serializes `start`, `pull` and `cancel`, so no call here can
 * overlap another.
 */
export class SequenceUnderlyingSource<T, E = unknown> {
  private iterator: AsyncIterator<Result<T, E>> | undefined
  private controller: ReadableStreamDefaultController<T> | undefined

  constructor(sequence: Sequence<T, E>) {
    this.iterator = toIterator(sequence)
  }

  /** Whether the sequence has been dropped (ended, errored or cancelled) */
  get isDropped(): boolean {
    return this.iterator === undefined
  }

  start(controller: ReadableStreamDefaultController<T>): void {
    this.controller = controller
  }

  async pull(): Promise<void> {
    const iterator = this.iterator
    const controller = this.controller
    if (!iterator || !controller) return

    const polled = await pollOnce(iterator)

    // cancel() may have run while the poll was pending
    if (this.iterator !== iterator) return

    if (polled === undefined) {
      this.release()
      logger.debug('Sequence ended; closing readable stream')
      controller.close()
      return
    }

    if (!polled.ok) {
      this.drop('error')
      logger.debug('Sequence yielded an error; erroring readable stream')
      controller.error(polled.error)
      return
    }

    controller.enqueue(polled.value)
  }

  cancel(reason?: unknown): void {
    if (!this.iterator) return
    logger.debug('Readable stream cancelled; dropping sequence', reason)
    this.drop('cancel')
  }

  /**
   * Stop the iterator without waiting for it. A generator suspended inside
   * `next()` queues `return()` behind it, so awaiting could stall the host.
   */
  private drop(cause: 'error' | 'cancel'): void {
    const iterator = this.iterator
    this.release()
    if (!iterator?.return) return

    const stop = iterator.return.bind(iterator)
    fireAndForget('sequence-drop', async () => {
      await stop()
    }, { cause })
  }

  private release(): void {
    this.iterator = undefined
    this.controller = undefined
  }
}

/**
 * Create a host ReadableStream that reads from a sequence.
 *
 * The high-water mark defaults to the configured `readableHighWaterMark`
 * (0 unless changed), so nothing is polled until a read is waiting.
 *
 * @example
 * ```typescript
 * async function* numbers() {
 *   yield Ok(1)
 *   yield Ok(2)
 * }
 *
 * const stream = readableFromSequence(numbers())
 * const response = new Response(stream)
 * ```
 */
export function readableFromSequence<T, E = unknown>(
  sequence: Sequence<T, E>,
  options?: ReadableFromSequenceOptions<T>
): ReadableStream<T> {
  const strategy = resolveQueuingStrategy(options, getConfig().readableHighWaterMark)
  const source = new SequenceUnderlyingSource<T, E>(sequence)

  return new ReadableStream<T>({
    start: (controller) => source.start(controller),
    pull: () => source.pull(),
    cancel: (reason) => source.cancel(reason),
  }, strategy)
}
