import type { Delay, DelayPolicy } from "../ports/delay-policy"
import { exponential } from "./strategies/exponential"

function validateBounds(min: Delay, max: Delay): { minMs: number; maxMs: number } {
  const minMs = min.milliseconds
  const maxMs = max.milliseconds

  if (!Number.isFinite(minMs) || minMs < 0) {
    throw new RangeError(`min.milliseconds must be finite and >= 0 (got ${minMs})`)
  }

  if (!Number.isFinite(maxMs) || maxMs < 0) {
    throw new RangeError(`max.milliseconds must be finite and >= 0 (got ${maxMs})`)
  }

  if (maxMs < minMs) {
    throw new RangeError(
      `max.milliseconds must be >= min.milliseconds (got ${maxMs} < ${minMs})`,
    )
  }

  return { minMs, maxMs }
}

export type CreateBackoffOptions = {
  delay: DelayPolicy

  /** Floor for delay. Must be finite, non-negative. */
  min: Delay

  /** Ceiling for delay. Must be finite, non-negative, >= min. */
  max: Delay
}

/**
 * Wraps a DelayPolicy so every delay is a whole number of ms in `[min, max]`.
 *
 * @remarks
 * Growth that overflows to `Infinity` saturates at `max`; `NaN` and negative
 * values fall back to `min`.
 */
export function createBackoff(options: CreateBackoffOptions): DelayPolicy {
  const { delay, min, max } = options
  const { minMs, maxMs } = validateBounds(min, max)

  return {
    getDelay(attempt: number): Delay {
      const raw = delay.getDelay(attempt).milliseconds

      if (raw === Number.POSITIVE_INFINITY) return { milliseconds: Math.floor(maxMs) }
      if (!Number.isFinite(raw) || raw < minMs) return { milliseconds: Math.floor(minMs) }

      return { milliseconds: Math.floor(Math.min(maxMs, raw)) }
    },
  }
}

export type CappedExponentialOptions = {
  /** Delay after the first failure. */
  initial: Delay

  /** Ceiling for any single delay. */
  max: Delay
}

/**
 * Backoff where the n-th consecutive failure (1-indexed) waits
 * `min(initial * 2^(n-1), max)`.
 */
export function cappedExponential(options: CappedExponentialOptions): DelayPolicy {
  return createBackoff({
    delay: exponential({ base: options.initial }),
    min: { milliseconds: 0 },
    max: options.max,
  })
}
