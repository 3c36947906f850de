import type { Clock, Milliseconds, UnixMs } from "@shardkv/clock"
import { BaseError } from "@shardkv/errors"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor } from "../ports/retry-executor"
import type { RetryFn } from "../ports/retry-fn"
import type { RetryResult } from "../ports/retry-result"

export type RetryExecutorDeps = {
  clock: Clock
}

export class RetryCancelledError extends BaseError<"retry_cancelled"> {
  constructor(attempts: number, elapsedMs: Milliseconds) {
    super("Retry cancelled", {
      code: "retry_cancelled",
      context: { attempts, elapsedMs },
    })
  }
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T, E = Error>(fn: RetryFn<T>, config: RetryConfig<T, E>): Promise<T> {
    const result = await this.run(fn, config)

    if (result.success) return result.value
    if (result.cancelled) throw new RetryCancelledError(result.attempts, result.elapsedMs)

    throw result.error
  }

  async tryExecute<T, E = Error>(
    fn: RetryFn<T>,
    config: RetryConfig<T, E>,
  ): Promise<RetryResult<T, E>> {
    return this.run(fn, config)
  }

  private async run<T, E>(
    fn: RetryFn<T>,
    config: RetryConfig<T, E>,
  ): Promise<RetryResult<T, E>> {
    this.validateConfig(config)

    const { maxAttempts, observer, signal } = config
    const startedAt = this.deps.clock.nowMs()

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const ctx = this.buildContext(attempt, startedAt, signal)

      if (this.isCancelled(config)) {
        await observer?.onCancelled?.(ctx)
        return this.cancelledResult(attempt, ctx.elapsedMs)
      }

      await observer?.onAttempt?.(ctx)

      const attemptResult = await this.tryAttempt(fn, ctx)

      if (attemptResult.ok) {
        await observer?.onSuccess?.(attemptResult.value, ctx)
        return {
          success: true,
          value: attemptResult.value,
          attempts: attempt + 1,
          elapsedMs: this.elapsedSince(startedAt),
        }
      }

      // Caught values are typed as E at the boundary.
      const error = attemptResult.error as E
      const elapsedMs = this.elapsedSince(startedAt)
      const timedOut = this.isTimedOut(elapsedMs, config.maxElapsedMs)
      const isLastAttempt = attempt === maxAttempts - 1 || timedOut

      if (isLastAttempt) {
        await observer?.onExhausted?.(error, this.buildAttemptInfo(ctx, null, true))
        return {
          success: false,
          cancelled: false,
          error,
          attempts: attempt + 1,
          elapsedMs,
          timedOut,
        }
      }

      if (this.isCancelled(config)) {
        await observer?.onCancelled?.(ctx)
        return this.cancelledResult(attempt + 1, elapsedMs)
      }

      const nextDelayMs = config.delay.getDelay(attempt).milliseconds
      await observer?.onError?.(error, this.buildAttemptInfo(ctx, nextDelayMs, false))
      await this.deps.clock.sleep(nextDelayMs, signal)
    }

    throw new RangeError("Unreachable: retry loop must terminate via return")
  }

  private async tryAttempt<T>(
    fn: RetryFn<T>,
    ctx: AttemptContext,
  ): Promise<AttemptResult<T>> {
    try {
      const value = await fn(ctx)
      return { ok: true, value }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private validateConfig<T, E>(config: RetryConfig<T, E>): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`,
      )
    }

    if (config.maxElapsedMs !== undefined) {
      if (!Number.isFinite(config.maxElapsedMs) || config.maxElapsedMs < 0) {
        throw new RangeError(
          `maxElapsedMs must be a finite number >= 0 (got ${config.maxElapsedMs})`,
        )
      }
    }
  }

  private isCancelled<T, E>(config: RetryConfig<T, E>): boolean {
    return (config.signal?.aborted ?? false) || (config.isCancelled?.() ?? false)
  }

  private isTimedOut(elapsedMs: Milliseconds, maxElapsedMs?: Milliseconds): boolean {
    return maxElapsedMs !== undefined && elapsedMs >= maxElapsedMs
  }

  private elapsedSince(startedAt: UnixMs): Milliseconds {
    return this.deps.clock.nowMs() - startedAt
  }

  private buildContext(
    attempt: number,
    startedAt: UnixMs,
    signal?: AbortSignal,
  ): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      startedAt,
      elapsedMs: this.elapsedSince(startedAt),
      ...(signal && { signal }),
    }
  }

  private buildAttemptInfo(
    ctx: AttemptContext,
    nextDelayMs: Milliseconds | null,
    isLastAttempt: boolean,
  ): RetryAttemptInfo {
    return { ...ctx, nextDelayMs, isLastAttempt }
  }

  private cancelledResult(attempts: number, elapsedMs: Milliseconds) {
    return { success: false, cancelled: true, attempts, elapsedMs } as const
  }
}
