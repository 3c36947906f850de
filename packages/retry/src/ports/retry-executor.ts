import type { RetryConfig } from "./retry-config"
import type { RetryFn } from "./retry-fn"
import type { RetryResult } from "./retry-result"

/**
 * Executes functions with retry logic.
 *
 * @remarks
 * Throwing behavior:
 * - execute() throws the last error on exhaustion and a `RetryCancelledError`
 *   on cancellation
 * - tryExecute() returns a result wrapper for all three outcomes
 * - Both propagate programmer errors (invalid config, observer throws)
 */
export interface IRetryExecutor {
  execute<T, E = Error>(fn: RetryFn<T>, config: RetryConfig<T, E>): Promise<T>
  tryExecute<T, E = Error>(
    fn: RetryFn<T>,
    config: RetryConfig<T, E>,
  ): Promise<RetryResult<T, E>>
}
