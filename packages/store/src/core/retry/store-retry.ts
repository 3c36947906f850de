import { cappedExponential, type DelayPolicy } from "@shardkv/backoff"
import type { Milliseconds } from "@shardkv/clock"
import type { Logger } from "@shardkv/logger"
import type { IRetryExecutor, RetryConfig, RetryObserver } from "@shardkv/retry"
import { retriesExhausted } from "../errors/store-error"

export type RetryPolicy = {
  initialDelayMs: Milliseconds
  maxDelayMs: Milliseconds
  maxAttempts: number
  maxElapsedMs?: Milliseconds
}

export type StoreRetryDeps = {
  executor: IRetryExecutor
  logger: Logger
}

export type Cancellation = {
  isCancelled: () => boolean
  signal: AbortSignal
}

export type Cancellable<T> = { cancelled: false; value: T } | { cancelled: true }

/**
 * Runs remote calls under the store's backoff policy and logs every failed
 * attempt.
 */
export class StoreRetry {
  private readonly delay: DelayPolicy

  constructor(
    private readonly deps: StoreRetryDeps,
    private readonly policy: RetryPolicy,
  ) {
    this.delay = cappedExponential({
      initial: { milliseconds: policy.initialDelayMs },
      max: { milliseconds: policy.maxDelayMs },
    })
  }

  /** Rejects with `retries_exhausted` once the policy gives up. */
  async run<T>(op: string, fn: () => Promise<T>): Promise<T> {
    const result = await this.runCancellable(op, fn)

    if (result.cancelled) {
      throw new RangeError(`Unreachable: ${op} was cancelled without a cancellation source`)
    }

    return result.value
  }

  /**
   * Like `run`, but stops as soon as `cancellation` says so. A cancelled run
   * resolves `{ cancelled: true }` and is never reported as a failure.
   */
  async runCancellable<T>(
    op: string,
    fn: () => Promise<T>,
    cancellation?: Cancellation,
  ): Promise<Cancellable<T>> {
    const config: RetryConfig<T, unknown> = {
      maxAttempts: this.policy.maxAttempts,
      delay: this.delay,
      ...(this.policy.maxElapsedMs !== undefined && { maxElapsedMs: this.policy.maxElapsedMs }),
      ...(cancellation && {
        isCancelled: cancellation.isCancelled,
        signal: cancellation.signal,
      }),
      observer: this.observer(op),
    }

    const result = await this.deps.executor.tryExecute(fn, config)

    if (result.success) return { cancelled: false, value: result.value }
    if (result.cancelled) return { cancelled: true }

    throw retriesExhausted(
      op,
      { attempts: result.attempts, elapsedMs: result.elapsedMs, timedOut: result.timedOut },
      result.error,
    )
  }

  private observer<T>(op: string): RetryObserver<T, unknown> {
    const { logger } = this.deps

    return {
      onError: async (error, info) => {
        const { name, message } = describe(error)
        logger.warn(`Attempt ${info.attemptsSoFar} failed with ${name}: ${message}`, {
          op,
          nextDelayMs: info.nextDelayMs,
        })
      },
      onExhausted: async (error, info) => {
        logger.warn("Retry with backoff failed, finally giving up", {
          op,
          attempts: info.attemptsSoFar,
          err: error,
        })
      },
      onCancelled: async (ctx) => {
        logger.debug("Retry cancelled", { op, attempt: ctx.attempt })
      },
    }
  }
}

function describe(error: unknown): { name: string; message: string } {
  if (error instanceof Error) return { name: error.name, message: error.message }

  return { name: typeof error, message: String(error) }
}
