import type { Milliseconds, UnixMs } from "@shardkv/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** Total attempts so far (attempt + 1) */
  attemptsSoFar: number

  /** Epoch ms when the first attempt started */
  startedAt: UnixMs

  /** ms since the first attempt started */
  elapsedMs: Milliseconds

  /** Signal for cooperative cancellation of in-flight work */
  signal?: AbortSignal
}

export interface RetryAttemptInfo extends AttemptContext {
  /** ms until the next attempt, null when no retry follows */
  nextDelayMs: Milliseconds | null

  /** True if no further attempt will be made */
  isLastAttempt: boolean
}
