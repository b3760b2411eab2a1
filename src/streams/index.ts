/**
 * Streams Module
 *
 * Adapters between pull-based sequences of Results and host streams:
 *
 * - **Sequence → ReadableStream**: `readableFromSequence`
 * - **AsyncSink → WritableStream**: `writableFromSink`
 * - **ReadableStream → sequence**: `sequenceFromReadable`
 * - **WritableStream → AsyncSink**: `sinkFromWritable`
 *
 * ## Quick Start
 *
 * ```typescript
 * import { readableFromSequence, resultsOf } from 'stream-bridge'
 *
 * const stream = readableFromSequence(resultsOf(['a', 'b', 'c']))
 * const response = new Response(stream)
 * ```
 *
 * @module streams
 */

// =============================================================================
// Adapters
// =============================================================================

export {
  readableFromSequence,
  SequenceUnderlyingSource,
  type ReadableFromSequenceOptions,
} from './sequence-source'

export {
  writableFromSink,
  SinkUnderlyingSink,
  type WritableFromSinkOptions,
} from './sink-target'

export {
  sequenceFromReadable,
  ReaderSequence,
  type SequenceFromReadableOptions,
} from './reader-sequence'

export {
  sinkFromWritable,
  WriterSink,
  type SinkFromWritableOptions,
} from './writer-sink'

// =============================================================================
// Composition
// =============================================================================

export {
  pipeSequenceTo,
  pipeSequenceThrough,
  feedStreamPair,
  duplexFromSequenceTransform,
  toPipeOptions,
  runPipe,
  type HostPipeOptions,
  type PipeSequenceOptions,
  type StreamPair,
  type DuplexOptions,
  type SequenceTransform,
} from './transform'

export {
  // Main factory function
  createStreamAdapter,

  // Individual adapter factories
  createWebReadableAdapter,
  createWebWritableAdapter,
  createSequenceAdapter,
  createSinkAdapter,

  // Type guards
  isWebReadableStream,
  isWebWritableStream,
  isSequence,
  isAsyncSink,

  // Types
  type StreamAdapterOptions,
  type WebReadableAdapterResult,
  type WebWritableAdapterResult,
  type SequenceAdapterResult,
  type SinkAdapterResult,
  type StreamInput,
  type StreamAdapterResult,
} from './adapter'

// =============================================================================
// Primitives
// =============================================================================

export { resultsOf, unwrapResults, collectSequence } from './sequence'

export { pollOnce, toIterator, type Sequence } from './poll'

export { settle, settleCall, type StickyFailure } from './settle'

export {
  CancellationSource,
  tokenFromSignal,
  signalFromToken,
  toCancellationToken,
  isCancellationToken,
  raceCancellation,
  type CancellationToken,
  type CancellationInput,
  type LinkedSignal,
  type RaceOutcome,
} from './cancellation'
