import type { DelayPolicy } from "@shardkv/backoff"
import type { Milliseconds } from "@shardkv/clock"
import type { RetryObserver } from "./observer"

/**
 * Configuration for one logical retried operation.
 *
 * @remarks
 * `maxAttempts` is total tries, not retries.
 * - maxAttempts=1 → try once, no retry
 * - maxAttempts=3 → try once + up to 2 retries
 *
 * Cancellation is checked before every attempt and before every scheduled
 * retry. A cancelled run is reported as cancelled, never as exhausted.
 */
export interface RetryConfig<T = unknown, E = Error> {
  /** Total attempts (not retries). Must be >= 1 */
  maxAttempts: number

  /** Delay policy between attempts */
  delay: DelayPolicy

  /**
   * Max wall-clock time since the first attempt, in ms.
   * A failure observed at or past this point is terminal.
   */
  maxElapsedMs?: Milliseconds

  /** Returns true once the caller no longer wants the result. */
  isCancelled?: () => boolean

  /** Wakes a pending backoff sleep early; aborting also counts as cancelled. */
  signal?: AbortSignal

  /** Lifecycle hooks */
  observer?: RetryObserver<T, E>
}
