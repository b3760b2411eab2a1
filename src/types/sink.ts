/**
 * Async consumer contract
 *
 * The push-side counterpart of a sequence. A producer waits for `ready()`
 * before every `send()`, then ends the sink with `close()` or `abort()`.
 * A rejected promise carries the sink's error, which adapters relay unchanged.
 */
export interface AsyncSink<T> {
  /** Resolves when the sink can accept another chunk (backpressure gate) */
  ready(): Promise<void>
  /** Hand one chunk to the sink; resolves once the sink has accepted it */
  send(chunk: T): Promise<void>
  /** Resolves once every accepted chunk has been fully processed */
  flush?(): Promise<void>
  /** Finish the sink after all accepted chunks */
  close(): Promise<void>
  /** Tear the sink down early, discarding what has not been processed */
  abort?(reason?: unknown): Promise<void>
}

export function isAsyncSink(value: unknown): value is AsyncSink<unknown> {
  return (
    value !== null &&
    typeof value === 'object' &&
    'ready' in value &&
    typeof value.ready === 'function' &&
    'send' in value &&
    typeof value.send === 'function' &&
    'close' in value &&
    typeof value.close === 'function'
  )
}
