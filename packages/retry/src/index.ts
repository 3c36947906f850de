export { createRetryExecutor, RetryCancelledError } from "./core/retry-executor"
export type { RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { RetryObserver } from "./ports/observer"
export type { RetryConfig } from "./ports/retry-config"
export type { IRetryExecutor } from "./ports/retry-executor"
export type { RetryFn } from "./ports/retry-fn"
export type {
  CancelledRetryResult,
  FailedRetryResult,
  RetryResult,
  SuccessfulRetryResult,
} from "./ports/retry-result"
