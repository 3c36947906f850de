import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for elapsed-time calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Suspend the calling flow for `ms` milliseconds.
   *
   * Resolves early (never rejects) when `signal` is aborted, so callers re-check
   * their own cancellation state after waking.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
