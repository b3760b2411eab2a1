/**
 * Host writable stream → async sink
 *
 * Holds the exclusive writer of a host `WritableStream` and exposes it as an
 * {@link AsyncSink}. Backpressure comes from `writer.ready`; a chunk handed to
 * `send()` is queued on the host without waiting for it to be consumed.
 *
 * Failures are sticky: the first error any operation observes (a rejected
 * write, a rejected readiness wait, a failed close, a cancellation) is
 * returned by every later `ready`, `send`, `flush` and `close`, and the writer
 * lock is released with it.
 *
 * @module streams/writer-sink
 */

import type { WritableStream, WritableStreamDefaultWriter } from 'node:stream/web'
import type { AsyncSink } from '../types/sink'
import { CancelledError, ErrorCode, InvalidStateError, LockError } from '../errors'
import { logger } from '../utils/logger'
import { fireAndForget } from '../utils/fire-and-forget'
import { settle, type StickyFailure } from './settle'
import {
  raceCancellation,
  toCancellationToken,
  type CancellationInput,
  type CancellationToken,
} from './cancellation'

export interface SinkFromWritableOptions {
  /**
   * When this fires during a readiness wait, the stream is aborted with the
   * signal's reason, the writer lock is released and the wait rejects with
   * `CancelledError`.
   */
  signal?: CancellationInput | undefined
}

export class WriterSink<T> implements AsyncSink<T> {
  private writer: WritableStreamDefaultWriter<T> | undefined
  private failure: StickyFailure | undefined
  private closing: Promise<void> | undefined
  private aborting: Promise<void> | undefined
  private readonly pending = new Set<Promise<void>>()
  private readonly token: CancellationToken | undefined

  /**
   * Lock `stream` to a new writer and wrap it.
   *
   * @throws LockError if the stream is already locked
   */
  static acquire<T>(stream: WritableStream<T>, options: SinkFromWritableOptions = {}): WriterSink<T> {
    let writer: WritableStreamDefaultWriter<T>
    try {
      writer = stream.getWriter()
    } catch (error) {
      throw new LockError('writer', error)
    }
    return new WriterSink(writer, options)
  }

  constructor(writer: WritableStreamDefaultWriter<T>, options: SinkFromWritableOptions = {}) {
    this.writer = writer
    this.token = toCancellationToken(options.signal)
  }

  /** Whether the writer lock has been given back */
  get isReleased(): boolean {
    return this.writer === undefined
  }

  /** Number of sent chunks the host has not finished writing */
  get pendingWrites(): number {
    return this.pending.size
  }

  async ready(): Promise<void> {
    const writer = this.current()
    const outcome = await raceCancellation(settle(writer.ready), this.token)

    if (outcome.cancelled) {
      logger.debug('Cancellation signal fired; aborting writable stream', outcome.reason)
      fireAndForget('writer-abort', () => writer.abort(outcome.reason))
      throw this.fail(new CancelledError('ready', outcome.reason))
    }

    const waited = outcome.value
    if (!waited.ok) {
      throw this.fail(waited.error)
    }
  }

  /**
   * Wait for readiness, then queue `chunk` on the host. Resolves once the
   * chunk is queued; a later rejection of the write surfaces on the next
   * operation.
   */
  async send(chunk: T): Promise<void> {
    await this.ready()
    const writer = this.current()

    const write: Promise<void> = settle(writer.write(chunk)).then((result) => {
      this.pending.delete(write)
      if (!result.ok) {
        logger.debug('Queued write rejected; sink is now failed')
        this.fail(result.error)
      }
    })
    this.pending.add(write)
  }

  /**
   * Wait until every queued write has been handled by the host.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending])
    if (this.failure) {
      throw this.failure.error
    }
  }

  /**
   * Close the stream and release the writer lock. Repeated calls return the
   * first call's promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.closeWriter()
    }
    return this.closing
  }

  /**
   * Abort the stream with `reason` and release the writer lock. Repeated calls
   * return the first call's promise; after a release this does nothing.
   */
  abort(reason?: unknown): Promise<void> {
    if (!this.aborting) {
      this.aborting = this.abortWriter(reason)
    }
    return this.aborting
  }

  /**
   * Give the writer lock back without closing the stream. Idempotent.
   */
  releaseLock(): void {
    this.release()
  }

  private current(): WritableStreamDefaultWriter<T> {
    if (this.failure) {
      throw this.failure.error
    }
    if (this.closing) {
      throw new InvalidStateError('Cannot use a sink after close()', ErrorCode.SINK_CLOSED)
    }
    if (!this.writer) {
      throw new InvalidStateError('Cannot use a sink after its writer lock was released', ErrorCode.SINK_RELEASED)
    }
    return this.writer
  }

  private async closeWriter(): Promise<void> {
    if (this.failure) {
      throw this.failure.error
    }
    const writer = this.writer
    if (!writer) {
      throw new InvalidStateError('Cannot close a sink after its writer lock was released', ErrorCode.SINK_RELEASED)
    }

    const ack = await settle(writer.close())
    if (!ack.ok) {
      throw this.fail(ack.error)
    }
    logger.debug('Writable stream closed')
    this.release()
  }

  private async abortWriter(reason: unknown): Promise<void> {
    const writer = this.writer
    if (!writer) return

    logger.debug('Aborting writable stream', reason)
    const ack = await settle(writer.abort(reason))
    this.release()
    if (!ack.ok) {
      throw ack.error
    }
  }

  /**
   * Record the first failure and return the value every later call reports.
   * A failed sink gives its writer lock back.
   */
  private fail(error: unknown): unknown {
    if (!this.failure) {
      this.failure = { error }
    }
    this.release()
    return this.failure.error
  }

  private release(): void {
    const writer = this.writer
    if (!writer) return
    this.writer = undefined
    writer.releaseLock()
    logger.debug('Writer lock released')
  }
}

/**
 * Lock a host WritableStream and drive it as an async sink.
 *
 * @throws LockError if the stream is already locked
 *
 * @example
 * ```typescript
 * const sink = sinkFromWritable(destination)
 * for (const chunk of chunks) {
 *   await sink.send(chunk)
 * }
 * await sink.close()
 * ```
 */
export function sinkFromWritable<T>(
  stream: WritableStream<T>,
  options?: SinkFromWritableOptions
): WriterSink<T> {
  return WriterSink.acquire(stream, options)
}
