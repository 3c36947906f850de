import type { Milliseconds } from "@shardkv/clock"

export type Delay = { milliseconds: Milliseconds }

/**
 * Delay before the next attempt, given the 0-indexed attempt that just failed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
