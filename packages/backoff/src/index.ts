export {
  type CappedExponentialOptions,
  type CreateBackoffOptions,
  cappedExponential,
  createBackoff,
} from "./core/create-backoff"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
