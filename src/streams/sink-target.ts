/**
 * Async sink → host writable stream
 *
 * Wraps an {@link AsyncSink} as the underlying sink of a host
 * `WritableStream`. Each host write passes the sink's readiness gate before
 * the chunk is sent.
 *
 * Known gap: the host only hears about a sink failure through the promise of
 * the write, close or abort it initiated. If the sink fails on its own between
 * two host calls, nothing here can move the stream into the errored state; the
 * failure surfaces when the host makes its next call.
 *
 * @module streams/sink-target
 */

import { WritableStream } from 'node:stream/web'
import type { AsyncSink } from '../types/sink'
import { getConfig, resolveQueuingStrategy, type QueuingOptions } from '../config'
import { logger } from '../utils/logger'
import { ErrorCode, InvalidStateError } from '../errors'
import type { StickyFailure } from './settle'

export type WritableFromSinkOptions<T> = QueuingOptions<T>

/**
 * Underlying sink that owns an AsyncSink.
 *
 * The host never overlaps write/close/abort calls on one stream. Once closed,
 * aborted or failed by a write, the sink is dropped: writes become no-ops and
 * a second teardown returns the first one's outcome.
 */
export class SinkUnderlyingSink<T> {
  private sink: AsyncSink<T> | undefined
  private teardown: Promise<void> | undefined
  private failure: StickyFailure | undefined

  constructor(sink: AsyncSink<T>) {
    this.sink = sink
  }

  get isDropped(): boolean {
    return this.sink === undefined
  }

  async write(chunk: T): Promise<void> {
    const sink = this.sink
    if (!sink) return

    try {
      await sink.ready()
      await sink.send(chunk)
      if (sink.flush) {
        await sink.flush()
      }
    } catch (error) {
      // The host errors the stream and makes no further calls
      this.sink = undefined
      this.failure = { error }
      logger.debug('Sink failed a write; dropping it', error)
      throw error
    }
  }

  /**
   * Close the sink. A repeated close (or an abort after it) returns the
   * outcome of the first teardown; after a failed write, the write's error.
   */
  close(): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure.error)
    }
    if (!this.teardown) {
      const sink = this.take()
      this.teardown = sink.close().then(() => {
        logger.debug('Writable stream closed its sink')
      })
    }
    return this.teardown
  }

  /**
   * Best-effort abort. A rejection from the sink is returned to the host, which
   * completes its own teardown regardless.
   */
  abort(reason?: unknown): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure.error)
    }
    if (!this.teardown) {
      const sink = this.take()
      logger.debug('Writable stream aborted; aborting sink', reason)
      this.teardown = sink.abort ? sink.abort(reason) : Promise.resolve()
    }
    return this.teardown
  }

  private take(): AsyncSink<T> {
    const sink = this.sink
    if (!sink) {
      throw new InvalidStateError('Sink has already been released', ErrorCode.SINK_RELEASED)
    }
    this.sink = undefined
    return sink
  }
}

/**
 * Create a host WritableStream that forwards every chunk to a sink.
 *
 * @example
 * ```typescript
 * const stream = writableFromSink(sinkFromWritable(destination))
 * await source.pipeTo(stream)
 * ```
 */
export function writableFromSink<T>(
  sink: AsyncSink<T>,
  options?: WritableFromSinkOptions<T>
): WritableStream<T> {
  const strategy = resolveQueuingStrategy(options, getConfig().writableHighWaterMark)
  const target = new SinkUnderlyingSink<T>(sink)

  return new WritableStream<T>({
    write: (chunk) => target.write(chunk),
    close: () => target.close(),
    abort: (reason) => target.abort(reason),
  }, strategy)
}
