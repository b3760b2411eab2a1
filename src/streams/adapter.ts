/**
 * Stream Adapter Factory
 *
 * One entry point for every direction of the bridge. `createStreamAdapter`
 * detects what it was given and returns the matching adapter:
 *
 * | Input | Adapter |
 * | --- | --- |
 * | host `ReadableStream` | {@link WebReadableAdapterResult} |
 * | host `WritableStream` | {@link WebWritableAdapterResult} |
 * | sequence of Results | {@link SequenceAdapterResult} |
 * | {@link AsyncSink} | {@link SinkAdapterResult} |
 *
 * ## Usage
 *
 * ```typescript
 * import { createStreamAdapter, Ok } from 'stream-bridge'
 *
 * // Sequence → host readable
 * async function* numbers() {
 *   yield Ok(1)
 *   yield Ok(2)
 * }
 * const stream = createStreamAdapter(numbers()).toWebReadable()
 *
 * // Host readable → sequence
 * for await (const result of createStreamAdapter(stream).toSequence()) {
 *   if (!result.ok) throw result.error
 *   console.log(result.value)
 * }
 * ```
 *
 * @module streams/adapter
 */

import { ReadableStream, WritableStream } from 'node:stream/web'
import { isAsyncSink, type AsyncSink } from '../types/sink'
import type { Result } from '../types/result'
import { ConfigurationError } from '../errors'
import type { QueuingOptions } from '../config'
import { readableFromSequence } from './sequence-source'
import { writableFromSink } from './sink-target'
import { ReaderSequence } from './reader-sequence'
import { WriterSink } from './writer-sink'
import { unwrapResults } from './sequence'
import {
  feedStreamPair,
  pipeSequenceTo,
  runPipe,
  type PipeSequenceOptions,
  type StreamPair,
} from './transform'
import type { CancellationInput } from './cancellation'
import type { Sequence } from './poll'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for creating stream adapters
 */
export interface StreamAdapterOptions<T = unknown> extends QueuingOptions<T> {
  /**
   * Cancellation for the sequences, sinks and pipes the adapter creates
   */
  signal?: CancellationInput | undefined
}

/**
 * Adapter over a host ReadableStream
 */
export interface WebReadableAdapterResult<T> {
  /** Original host stream */
  webStream: ReadableStream<T>

  /** Lock the stream and read it as a sequence of Results */
  toSequence(): ReaderSequence<T>

  /** Lock the stream and iterate its chunks; a stream error is thrown */
  toAsyncIterator(): AsyncIterableIterator<T>

  /** Pipe to a host WritableStream */
  pipeTo(destination: WritableStream<T>, options?: PipeSequenceOptions<T>): Promise<void>

  /** Split into two adapters that each see every chunk */
  tee(): [WebReadableAdapterResult<T>, WebReadableAdapterResult<T>]

  /** Cancel the underlying stream */
  cancel(reason?: unknown): Promise<void>
}

/**
 * Adapter over a host WritableStream
 */
export interface WebWritableAdapterResult<T> {
  /** Original host stream */
  webStream: WritableStream<T>

  /** Lock the stream and drive it as an async sink */
  toSink(): WriterSink<T>

  /** Abort the underlying stream */
  abort(reason?: unknown): Promise<void>
}

/**
 * Adapter over a sequence of Results
 */
export interface SequenceAdapterResult<T, E = unknown> {
  /** Original sequence */
  sequence: Sequence<T, E>

  /** Expose as a host ReadableStream */
  toWebReadable(): ReadableStream<T>

  /** Pipe every item into a host WritableStream */
  pipeTo(destination: WritableStream<T>, options?: PipeSequenceOptions<T>): Promise<void>

  /** Pipe through a host stream pair and adapt its readable side */
  pipeThrough<O>(pair: StreamPair<T, O>): WebReadableAdapterResult<O>
}

/**
 * Adapter over an async sink
 */
export interface SinkAdapterResult<T> {
  /** Original sink */
  sink: AsyncSink<T>

  /** Expose as a host WritableStream */
  toWebWritable(): WritableStream<T>
}

// =============================================================================
// Host ReadableStream Adapter
// =============================================================================

/**
 * Creates an adapter for a host ReadableStream
 */
function createWebReadableAdapter<T>(
  stream: ReadableStream<T>,
  options: StreamAdapterOptions<T> = {}
): WebReadableAdapterResult<T> {
  return {
    webStream: stream,

    toSequence(): ReaderSequence<T> {
      return ReaderSequence.acquire(stream, { signal: options.signal })
    },

    toAsyncIterator(): AsyncIterableIterator<T> {
      return unwrapResults(ReaderSequence.acquire(stream, { signal: options.signal }))
    },

    pipeTo(destination: WritableStream<T>, pipeOptions: PipeSequenceOptions<T> = {}): Promise<void> {
      return runPipe(stream, destination, { signal: options.signal, ...pipeOptions })
    },

    tee(): [WebReadableAdapterResult<T>, WebReadableAdapterResult<T>] {
      const [left, right] = stream.tee()
      return [createWebReadableAdapter(left, options), createWebReadableAdapter(right, options)]
    },

    cancel(reason?: unknown): Promise<void> {
      return stream.cancel(reason)
    },
  }
}

// =============================================================================
// Host WritableStream Adapter
// =============================================================================

/**
 * Creates an adapter for a host WritableStream
 */
function createWebWritableAdapter<T>(
  stream: WritableStream<T>,
  options: StreamAdapterOptions<T> = {}
): WebWritableAdapterResult<T> {
  return {
    webStream: stream,

    toSink(): WriterSink<T> {
      return WriterSink.acquire(stream, { signal: options.signal })
    },

    abort(reason?: unknown): Promise<void> {
      return stream.abort(reason)
    },
  }
}

// =============================================================================
// Sequence Adapter
// =============================================================================

/**
 * Creates an adapter for a sequence of Results
 */
function createSequenceAdapter<T, E>(
  sequence: Sequence<T, E>,
  options: StreamAdapterOptions<T> = {}
): SequenceAdapterResult<T, E> {
  const queuing: QueuingOptions<T> = {
    highWaterMark: options.highWaterMark,
    size: options.size,
  }

  return {
    sequence,

    toWebReadable(): ReadableStream<T> {
      return readableFromSequence(sequence, queuing)
    },

    pipeTo(destination: WritableStream<T>, pipeOptions: PipeSequenceOptions<T> = {}): Promise<void> {
      return pipeSequenceTo(sequence, destination, { ...queuing, signal: options.signal, ...pipeOptions })
    },

    pipeThrough<O>(pair: StreamPair<T, O>): WebReadableAdapterResult<O> {
      const readable = feedStreamPair(sequence, pair, { ...queuing, signal: options.signal })
      return createWebReadableAdapter(readable, { signal: options.signal })
    },
  }
}

// =============================================================================
// Async Sink Adapter
// =============================================================================

/**
 * Creates an adapter for an async sink
 */
function createSinkAdapter<T>(
  sink: AsyncSink<T>,
  options: StreamAdapterOptions<T> = {}
): SinkAdapterResult<T> {
  return {
    sink,

    toWebWritable(): WritableStream<T> {
      return writableFromSink(sink, { highWaterMark: options.highWaterMark, size: options.size })
    },
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Input type for createStreamAdapter
 */
export type StreamInput =
  | ReadableStream<unknown>
  | WritableStream<unknown>
  | Sequence<unknown>
  | AsyncSink<unknown>

/**
 * Output type based on input
 */
export type StreamAdapterResult<S> =
  S extends ReadableStream<infer T> ? WebReadableAdapterResult<T> :
  S extends WritableStream<infer T> ? WebWritableAdapterResult<T> :
  S extends AsyncIterable<Result<infer T, infer E>> ? SequenceAdapterResult<T, E> :
  S extends AsyncIterator<Result<infer T, infer E>> ? SequenceAdapterResult<T, E> :
  S extends AsyncSink<infer T> ? SinkAdapterResult<T> :
  never

/**
 * Create a stream adapter for a host stream, a sequence or a sink
 *
 * Detects the kind of input and returns the matching adapter. Host streams
 * are checked before sequences, since a host ReadableStream is itself async
 * iterable.
 *
 * @throws ConfigurationError if the input is none of the supported kinds
 *
 * @example
 * ```typescript
 * const sink = createStreamAdapter(new WritableStream({ write: console.log })).toSink()
 * await sink.send('hello')
 * await sink.close()
 * ```
 */
export function createStreamAdapter<S extends StreamInput>(
  input: S,
  options?: StreamAdapterOptions
): StreamAdapterResult<S>

export function createStreamAdapter(
  input: StreamInput,
  options: StreamAdapterOptions = {}
):
  | WebReadableAdapterResult<unknown>
  | WebWritableAdapterResult<unknown>
  | SequenceAdapterResult<unknown>
  | SinkAdapterResult<unknown> {
  if (isWebReadableStream(input)) {
    return createWebReadableAdapter(input, options)
  }

  if (isWebWritableStream(input)) {
    return createWebWritableAdapter(input, options)
  }

  if (isAsyncSink(input)) {
    return createSinkAdapter(input, options)
  }

  if (isSequence(input)) {
    return createSequenceAdapter(input, options)
  }

  throw new ConfigurationError(
    'Unknown stream type: expected a ReadableStream, a WritableStream, a sequence or an async sink',
    { input: describeInput(input) }
  )
}

function describeInput(input: unknown): string {
  if (input === null) return 'null'
  if (typeof input !== 'object') return typeof input
  return input.constructor?.name ?? 'object'
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a host ReadableStream
 */
export function isWebReadableStream(value: unknown): value is ReadableStream<unknown> {
  if (value instanceof ReadableStream) return true
  return (
    value !== null &&
    typeof value === 'object' &&
    'getReader' in value &&
    typeof value.getReader === 'function' &&
    'cancel' in value &&
    typeof value.cancel === 'function' &&
    'tee' in value &&
    typeof value.tee === 'function'
  )
}

/**
 * Check if a value is a host WritableStream
 */
export function isWebWritableStream(value: unknown): value is WritableStream<unknown> {
  if (value instanceof WritableStream) return true
  return (
    value !== null &&
    typeof value === 'object' &&
    'getWriter' in value &&
    typeof value.getWriter === 'function' &&
    'abort' in value &&
    typeof value.abort === 'function'
  )
}

/**
 * Check if a value can be consumed as a sequence: an async iterable, or an
 * async iterator. Items are checked one at a time as they are read.
 */
export function isSequence(value: unknown): value is Sequence<unknown> {
  if (value === null || typeof value !== 'object') return false
  if (Symbol.asyncIterator in value) {
    return typeof value[Symbol.asyncIterator] === 'function'
  }
  return 'next' in value && typeof value.next === 'function'
}

export { isAsyncSink }

// =============================================================================
// Exports
// =============================================================================

export {
  createWebReadableAdapter,
  createWebWritableAdapter,
  createSequenceAdapter,
  createSinkAdapter,
}
