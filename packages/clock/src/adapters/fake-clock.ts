import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Virtual clock for tests.
 *
 * `sleep()` never waits: it records the requested duration and advances
 * virtual time by it, so elapsed-time guards observe the slept time.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private readonly slept: Milliseconds[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  /** Durations passed to `sleep()`, in call order. */
  get sleeps(): readonly Milliseconds[] {
    return this.slept
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.slept.push(ms)
    this.advance(ms)
  }
}
