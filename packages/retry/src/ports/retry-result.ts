import type { Milliseconds } from "@shardkv/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult<E = Error> = {
  success: false
  cancelled: false
  error: E
  attempts: number
  elapsedMs: Milliseconds

  /** True when the elapsed-time cap, not the attempt cap, ended the run */
  timedOut: boolean
}

export type CancelledRetryResult = {
  success: false
  cancelled: true
  attempts: number
  elapsedMs: Milliseconds
}

export type RetryResult<T, E = Error> =
  | SuccessfulRetryResult<T>
  | FailedRetryResult<E>
  | CancelledRetryResult
