/**
 * Composition
 *
 * Builds on the four adapters to connect sequences with host pipes:
 *
 * - {@link pipeSequenceTo}: sequence → host WritableStream
 * - {@link duplexFromSequenceTransform}: a sequence transform as a host
 *   `{ writable, readable }` pair
 * - {@link pipeSequenceThrough}: sequence → pair → sequence
 *
 * Nothing here buffers beyond the host queues of the streams involved.
 *
 * @module streams/transform
 */

import { ReadableStream, TransformStream } from 'node:stream/web'
import type { StreamPipeOptions, WritableStream } from 'node:stream/web'
import { LockError } from '../errors'
import { getConfig, resolveQueuingStrategy, type QueuingOptions } from '../config'
import { fireAndForget } from '../utils/fire-and-forget'
import { SequenceUnderlyingSource, readableFromSequence } from './sequence-source'
import { ReaderSequence } from './reader-sequence'
import { unwrapResults } from './sequence'
import { signalFromToken, type CancellationInput } from './cancellation'
import type { Sequence } from './poll'

// =============================================================================
// Types
// =============================================================================

export interface PipeSequenceOptions<T> extends QueuingOptions<T> {
  /** Leave the destination open when the sequence ends */
  preventClose?: boolean | undefined
  /** Leave the destination unaborted when the sequence fails */
  preventAbort?: boolean | undefined
  /** Leave the sequence running when the destination fails */
  preventCancel?: boolean | undefined
  /** Stops the pipe: the destination is aborted and the sequence dropped */
  signal?: CancellationInput | undefined
}

/**
 * A host writable/readable pair, such as a `TransformStream`
 */
export interface StreamPair<I, O> {
  writable: WritableStream<I>
  readable: ReadableStream<O>
}

export interface DuplexOptions<I, O> {
  /** Queuing strategy of the writable side */
  writableStrategy?: QueuingOptions<I> | undefined
  /** Queuing strategy of the readable side */
  readableStrategy?: QueuingOptions<O> | undefined
}

/**
 * Maps the chunks written to a pair to the sequence read from it
 */
export type SequenceTransform<I, O, E = unknown> = (input: AsyncIterable<I>) => Sequence<O, E>

// =============================================================================
// Pipes
// =============================================================================

/**
 * Pipe options for the host, with the disposer of any signal derived from a
 * token
 */
export interface HostPipeOptions {
  options: StreamPipeOptions
  dispose(): void
}

/**
 * Translate pipe options for the host, deriving an AbortSignal from a token.
 * Call `dispose` when the pipe settles.
 */
export function toPipeOptions<T>(options: PipeSequenceOptions<T>): HostPipeOptions {
  const { preventClose, preventAbort, preventCancel, signal } = options
  const pipeOptions: StreamPipeOptions = { preventClose, preventAbort, preventCancel }
  if (signal instanceof AbortSignal) {
    pipeOptions.signal = signal
  } else if (signal) {
    const link = signalFromToken(signal)
    pipeOptions.signal = link.signal
    return { options: pipeOptions, dispose: link.dispose }
  }
  return { options: pipeOptions, dispose: () => {} }
}

/**
 * Run a host pipe with translated options, detaching from the token once it
 * settles
 */
export function runPipe<T>(
  source: ReadableStream<T>,
  destination: WritableStream<T>,
  options: PipeSequenceOptions<T>
): Promise<void> {
  const { options: pipeOptions, dispose } = toPipeOptions(options)
  return source.pipeTo(destination, pipeOptions).finally(dispose)
}

/**
 * Pipe every item of a sequence into a host WritableStream.
 *
 * Resolves when the destination has closed. Rejects with the sequence's error
 * (the destination is aborted with it) or with the destination's error (the
 * sequence is dropped).
 *
 * @throws ConfigurationError if the queuing options are invalid
 *
 * @example
 * ```typescript
 * await pipeSequenceTo(rows(), sinkStream, { signal: controller.signal })
 * ```
 */
export function pipeSequenceTo<T, E>(
  sequence: Sequence<T, E>,
  destination: WritableStream<T>,
  options: PipeSequenceOptions<T> = {}
): Promise<void> {
  const readable = readableFromSequence(sequence, {
    highWaterMark: options.highWaterMark,
    size: options.size,
  })
  return runPipe(readable, destination, options)
}

/**
 * Expose a sequence transform as a host stream pair.
 *
 * Chunks written to `writable` reach `transform` as an async iterable; the
 * sequence it returns is read from `readable`. Aborting the writable side
 * makes the input iterable throw the abort reason; cancelling the readable
 * side errors the writable side with the cancel reason, so a pipe feeding it
 * stops.
 *
 * @example
 * ```typescript
 * const upper = duplexFromSequenceTransform(async function* (input: AsyncIterable<string>) {
 *   for await (const line of input) yield Ok(line.toUpperCase())
 * })
 * await response.body.pipeThrough(decoder).pipeThrough(upper).pipeTo(out)
 * ```
 */
export function duplexFromSequenceTransform<I, O, E = unknown>(
  transform: SequenceTransform<I, O, E>,
  options: DuplexOptions<I, O> = {}
): StreamPair<I, O> {
  const writableStrategy = resolveQueuingStrategy(options.writableStrategy, getConfig().writableHighWaterMark)
  const readableStrategy = resolveQueuingStrategy(options.readableStrategy, getConfig().readableHighWaterMark)
  const passthrough = new TransformStream<I, I>({}, writableStrategy)

  const input = ReaderSequence.acquire(passthrough.readable)
  const source = new SequenceUnderlyingSource<O, E>(transform(unwrapResults(input)))

  const readable = new ReadableStream<O>({
    start: (controller) => source.start(controller),
    pull: () => source.pull(),
    cancel: async (reason) => {
      // Cancelling the input errors the writable side with the same reason
      const cancelling = input.cancel(reason)
      source.cancel(reason)
      await cancelling
    },
  }, readableStrategy)

  return { writable: passthrough.writable, readable }
}

/**
 * Start piping a sequence into the writable side of a pair and hand back the
 * pair's readable side, unlocked.
 *
 * The pipe runs in the background. Its failure is not reported here: an error
 * of the sequence aborts the writable side, which errors the readable side.
 *
 * @throws LockError if the writable side is already locked
 * @throws ConfigurationError if the queuing options are invalid
 */
export function feedStreamPair<T, O, E>(
  sequence: Sequence<T, E>,
  pair: StreamPair<T, O>,
  options: PipeSequenceOptions<T> = {}
): ReadableStream<O> {
  if (pair.writable.locked) {
    throw new LockError('writer')
  }

  const piping = pipeSequenceTo(sequence, pair.writable, options)
  fireAndForget('pipe-through', () => piping)
  return pair.readable
}

/**
 * Pipe a sequence through a stream pair and read the pair's output as a
 * sequence.
 *
 * A failure anywhere in the pipe reaches the returned sequence as an `Err`
 * item.
 *
 * @throws LockError if either side of the pair is already locked
 * @throws ConfigurationError if the queuing options are invalid
 *
 * @example
 * ```typescript
 * const doubled = pipeSequenceThrough(numbers(), new TransformStream({
 *   transform: (n, controller) => controller.enqueue(n * 2),
 * }))
 * ```
 */
export function pipeSequenceThrough<T, O, E>(
  sequence: Sequence<T, E>,
  pair: StreamPair<T, O>,
  options: PipeSequenceOptions<T> = {}
): ReaderSequence<O> {
  if (pair.readable.locked) {
    throw new LockError('reader')
  }
  return ReaderSequence.acquire(feedStreamPair(sequence, pair, options))
}
