import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ExponentialOptions {
  /** Delay after the first failure. */
  base: Delay

  /** Multiplier per attempt. Default: 2 */
  factor?: number
}

/**
 * `base * factor^attempt`. Unbounded; wrap with `createBackoff` to cap it.
 */
export function exponential(opts: ExponentialOptions): DelayPolicy {
  const { base, factor = 2 } = opts

  return {
    getDelay(attempt: number): Delay {
      return { milliseconds: base.milliseconds * factor ** attempt }
    },
  }
}
