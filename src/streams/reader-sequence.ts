/**
 * Host readable stream → sequence
 *
 * Holds the exclusive reader of a host `ReadableStream` and exposes it as a
 * sequence of Results. Each `next()` issues one `read()`:
 *
 * ```
 *   idle ──next()──▶ reading ──chunk──▶ idle          yields Ok(chunk)
 *                       │
 *                       ├──closed──▶ done             ends
 *                       ├──rejected──▶ errored        yields Err(e) once, then ends
 *                       └──token fired──▶ done        cancels the stream, then ends
 * ```
 *
 * The reader lock is released on every terminal path and by `return()`, after
 * which the stream can be locked again.
 *
 * @module streams/reader-sequence
 */

import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web'
import { Err, Ok, type Result } from '../types/result'
import { LockError } from '../errors'
import { logger } from '../utils/logger'
import { fireAndForget } from '../utils/fire-and-forget'
import { settle } from './settle'
import {
  raceCancellation,
  toCancellationToken,
  type CancellationInput,
  type CancellationToken,
} from './cancellation'

export interface SequenceFromReadableOptions {
  /**
   * When this fires during a pending read, the stream is cancelled with the
   * signal's reason and the sequence ends normally.
   */
  signal?: CancellationInput | undefined
}

type ReaderState = 'idle' | 'reading' | 'done' | 'errored'

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined }

export class ReaderSequence<T> implements AsyncIterableIterator<Result<T>> {
  private reader: ReadableStreamDefaultReader<T> | undefined
  private state: ReaderState = 'idle'
  private tail: Promise<unknown> = Promise.resolve()
  private inflight: Promise<unknown> | undefined
  private cancelling: Promise<void> | undefined
  private readonly token: CancellationToken | undefined

  /**
   * Lock `stream` to a new reader and wrap it.
   *
   * @throws LockError if the stream is already locked
   */
  static acquire<T>(
    stream: ReadableStream<T>,
    options: SequenceFromReadableOptions = {}
  ): ReaderSequence<T> {
    let reader: ReadableStreamDefaultReader<T>
    try {
      reader = stream.getReader()
    } catch (error) {
      throw new LockError('reader', error)
    }
    return new ReaderSequence(reader, options)
  }

  /**
   * Wrap a reader acquired by the caller. Once the sequence ends or is
   * returned, the lock is released and the stream may be read again.
   */
  constructor(reader: ReadableStreamDefaultReader<T>, options: SequenceFromReadableOptions = {}) {
    this.reader = reader
    this.token = toCancellationToken(options.signal)
  }

  /** Whether the sequence has ended; every later `next()` yields done */
  get isTerminated(): boolean {
    return this.state === 'done' || this.state === 'errored'
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  /**
   * Read the next chunk. Calls are served in order; a call made while another
   * read is pending waits for it.
   */
  next(): Promise<IteratorResult<Result<T>, undefined>> {
    const step = this.tail.then(() => this.poll())
    this.tail = step
    return step
  }

  /**
   * Drop the sequence and release the reader lock. A pending read is
   * discarded; it does not keep the lock held.
   */
  async return(): Promise<IteratorResult<Result<T>, undefined>> {
    if (!this.isTerminated) {
      this.state = 'done'
    }
    this.release()
    return DONE
  }

  /**
   * Cancel the underlying stream and end the sequence.
   *
   * Rejects with the host's error if the stream's cancel fails; the sequence
   * is ended either way. Repeated calls return the first call's promise.
   */
  cancel(reason?: unknown): Promise<void> {
    if (!this.cancelling) {
      this.cancelling = this.cancelReader(reason)
    }
    return this.cancelling
  }

  private async cancelReader(reason: unknown): Promise<void> {
    const reader = this.reader
    if (!reader) return

    const ack = await this.cancelWith(reader, reason)
    if (!ack.ok) {
      throw ack.error
    }
  }

  private async poll(): Promise<IteratorResult<Result<T>, undefined>> {
    const reader = this.reader
    if (!reader || this.isTerminated) return DONE

    if (this.token?.isCancelled) {
      await this.cancelOnSignal(reader, this.token.reason)
      return DONE
    }

    this.state = 'reading'
    const read = settle(reader.read())
    this.inflight = read
    const outcome = await raceCancellation(read, this.token)
    this.inflight = undefined

    // return() ran while the read was pending
    if (this.reader !== reader) return DONE

    if (outcome.cancelled) {
      await this.cancelOnSignal(reader, outcome.reason)
      return DONE
    }

    const result = outcome.value
    if (!result.ok) {
      logger.debug('Readable stream errored; ending sequence after the error')
      this.finish('errored')
      return { done: false, value: Err(result.error) }
    }

    const chunk = result.value
    if (chunk.done) {
      logger.debug('Readable stream closed; ending sequence')
      this.finish('done')
      return DONE
    }

    this.state = 'idle'
    return { done: false, value: Ok(chunk.value) }
  }

  private async cancelOnSignal(reader: ReadableStreamDefaultReader<T>, reason: unknown): Promise<void> {
    logger.debug('Cancellation signal fired; cancelling readable stream', reason)
    const ack = await this.cancelWith(reader, reason)
    if (!ack.ok) {
      logger.warn('Readable stream rejected cancellation', ack.error)
    }
  }

  private async cancelWith(reader: ReadableStreamDefaultReader<T>, reason: unknown): Promise<Result<void>> {
    const ack = await settle(reader.cancel(reason))
    this.finish('done')
    return ack
  }

  private finish(state: 'done' | 'errored'): void {
    if (!this.isTerminated) {
      this.state = state
    }
    this.release()
  }

  private release(): void {
    const reader = this.reader
    if (!reader) return
    this.reader = undefined

    const inflight = this.inflight
    try {
      reader.releaseLock()
      logger.debug('Reader lock released')
    } catch (error) {
      // Hosts implementing the older standard refuse while a read is pending
      if (!inflight) throw error
      logger.debug('Reader lock release deferred until the pending read settles', error)
      fireAndForget('deferred-release', async () => {
        await inflight
        reader.releaseLock()
      })
    }
  }
}

/**
 * Lock a host ReadableStream and read it as a sequence of Results.
 *
 * @throws LockError if the stream is already locked
 *
 * @example
 * ```typescript
 * for await (const result of sequenceFromReadable(response.body)) {
 *   if (!result.ok) throw result.error
 *   process(result.value)
 * }
 * ```
 */
export function sequenceFromReadable<T>(
  stream: ReadableStream<T>,
  options?: SequenceFromReadableOptions
): ReaderSequence<T> {
  return ReaderSequence.acquire(stream, options)
}
