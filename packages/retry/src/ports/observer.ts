import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks for diagnostics.
 *
 * @remarks
 * Observer methods should not throw. If they do, the executor treats it as a
 * programmer error and propagates it (even from tryExecute).
 */
export interface RetryObserver<T, E = Error> {
  onAttempt?(ctx: AttemptContext): Promise<void>

  /** A failed attempt that will be retried after `info.nextDelayMs`. */
  onError?(error: E, info: RetryAttemptInfo): Promise<void>

  onSuccess?(result: T, ctx: AttemptContext): Promise<void>

  /** The final failure: attempt cap or elapsed-time cap reached. */
  onExhausted?(error: E, info: RetryAttemptInfo): Promise<void>

  /** The cancellation predicate or signal stopped the run. */
  onCancelled?(ctx: AttemptContext): Promise<void>
}
