/**
 * Cancellation racing
 *
 * A cancellation token is a fire-once external notification. Any adapter
 * operation that may wait indefinitely (a pending read, a readiness wait) is
 * raced against it with {@link raceCancellation}; the loser is abandoned, not
 * awaited.
 *
 * `AbortSignal` is accepted wherever a token is, and converted with
 * {@link toCancellationToken}.
 *
 * @module streams/cancellation
 */

// =============================================================================
// Types
// =============================================================================

/**
 * A fire-once cancellation notification
 */
export interface CancellationToken {
  /** Whether the token has already fired */
  readonly isCancelled: boolean
  /** Reason given when the token fired; undefined before that */
  readonly reason: unknown
  /**
   * Register a one-shot listener. If the token already fired, the listener is
   * not called. Returns a function that removes the listener.
   */
  onCancel(listener: (reason: unknown) => void): () => void
}

/**
 * Anything the adapters accept as a cancellation signal
 */
export type CancellationInput = CancellationToken | AbortSignal

/**
 * Outcome of racing an operation against a token
 */
export type RaceOutcome<T> =
  | { cancelled: false; value: T }
  | { cancelled: true; reason: unknown }

// =============================================================================
// Token Sources
// =============================================================================

/**
 * Owner side of a token. `cancel` fires the token once; later calls are ignored.
 *
 * @example
 * ```typescript
 * const source = new CancellationSource()
 * const sequence = sequenceFromReadable(stream, { signal: source.token })
 * source.cancel('user navigated away')
 * ```
 */
export class CancellationSource {
  private readonly state: {
    cancelled: boolean
    reason: unknown
    listeners: Set<(reason: unknown) => void>
  } = {
    cancelled: false,
    reason: undefined,
    listeners: new Set(),
  }

  readonly token: CancellationToken

  constructor() {
    const state = this.state
    this.token = {
      get isCancelled(): boolean {
        return state.cancelled
      },
      get reason(): unknown {
        return state.reason
      },
      onCancel(listener: (reason: unknown) => void): () => void {
        if (state.cancelled) {
          return () => {}
        }
        state.listeners.add(listener)
        return () => {
          state.listeners.delete(listener)
        }
      },
    }
  }

  cancel(reason?: unknown): void {
    if (this.state.cancelled) return
    this.state.cancelled = true
    this.state.reason = reason
    const listeners = [...this.state.listeners]
    this.state.listeners.clear()
    for (const listener of listeners) {
      listener(reason)
    }
  }
}

/**
 * Wrap an AbortSignal as a token. The listener is attached with `once` and
 * removed again when unsubscribed.
 */
export function tokenFromSignal(signal: AbortSignal): CancellationToken {
  return {
    get isCancelled(): boolean {
      return signal.aborted
    },
    get reason(): unknown {
      return signal.aborted ? signal.reason : undefined
    },
    onCancel(listener: (reason: unknown) => void): () => void {
      if (signal.aborted) {
        return () => {}
      }
      const handler = (): void => listener(signal.reason)
      signal.addEventListener('abort', handler, { once: true })
      return () => signal.removeEventListener('abort', handler)
    },
  }
}

/**
 * An AbortSignal that follows a token until disposed
 */
export interface LinkedSignal {
  readonly signal: AbortSignal
  /** Stop following the token. The signal keeps its current state. */
  dispose(): void
}

/**
 * Derive an AbortSignal from a token, for host APIs such as `pipeTo` that only
 * take signals. Dispose the link once the operation using the signal settles,
 * or the token keeps a listener for as long as it lives.
 */
export function signalFromToken(token: CancellationToken): LinkedSignal {
  const controller = new AbortController()
  if (token.isCancelled) {
    controller.abort(token.reason)
    return { signal: controller.signal, dispose: () => {} }
  }
  const unsubscribe = token.onCancel((reason) => controller.abort(reason))
  return { signal: controller.signal, dispose: unsubscribe }
}

export function isCancellationToken(value: unknown): value is CancellationToken {
  return (
    value !== null &&
    typeof value === 'object' &&
    'isCancelled' in value &&
    typeof value.isCancelled === 'boolean' &&
    'onCancel' in value &&
    typeof value.onCancel === 'function'
  )
}

/**
 * Normalize a token-or-signal option
 */
export function toCancellationToken(input: CancellationInput): CancellationToken
export function toCancellationToken(input: CancellationInput | undefined): CancellationToken | undefined
export function toCancellationToken(input: CancellationInput | undefined): CancellationToken | undefined {
  if (input === undefined) return undefined
  if (input instanceof AbortSignal) return tokenFromSignal(input)
  return input
}

// =============================================================================
// Racing
// =============================================================================

/**
 * Resolve with whichever comes first: the operation settling or the token
 * firing.
 *
 * - If the operation wins, the token listener is removed and the outcome
 *   carries its value. A rejection of the operation is re-raised.
 * - If the token wins (or had already fired), the outcome carries the reason.
 *   The operation keeps a rejection handler so that its eventual failure is
 *   not reported as unhandled; its result is discarded.
 */
export function raceCancellation<T>(
  operation: PromiseLike<T>,
  token: CancellationToken | undefined
): Promise<RaceOutcome<T>> {
  if (!token) {
    return Promise.resolve(operation).then((value) => ({ cancelled: false as const, value }))
  }

  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    let settled = false
    let unsubscribe: () => void = () => {}

    Promise.resolve(operation).then(
      (value) => {
        unsubscribe()
        if (settled) return
        settled = true
        resolve({ cancelled: false, value })
      },
      (error: unknown) => {
        unsubscribe()
        if (settled) return
        settled = true
        reject(error)
      }
    )

    if (token.isCancelled) {
      settled = true
      resolve({ cancelled: true, reason: token.reason })
      return
    }

    unsubscribe = token.onCancel((reason) => {
      if (settled) return
      settled = true
      resolve({ cancelled: true, reason })
    })
  })
}
