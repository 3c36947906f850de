import type { Milliseconds } from "@shardkv/clock"
import { BaseError, type ErrorContext } from "@shardkv/errors"

export type StoreErrorCode =
  | "null_argument"
  | "empty_value"
  | "end_of_sequence"
  | "store_not_open"
  | "retries_exhausted"
  | "write_failed"
  | "scan_failed"

export class StoreError extends BaseError<StoreErrorCode> {}

export type ExhaustedRun = {
  attempts: number
  elapsedMs: Milliseconds
  timedOut: boolean
}

export function nullArgument(argument: "key" | "value"): StoreError {
  return new StoreError(`${argument} cannot be null`, {
    code: "null_argument",
    context: { argument },
  })
}

/** Zero bytes is how the store marks an absent value, so no value may encode to it. */
export function emptyValue(): StoreError {
  return new StoreError("value encodes to zero bytes", { code: "empty_value" })
}

export function endOfSequence(): StoreError {
  return new StoreError("No more entries", { code: "end_of_sequence" })
}

export function storeNotOpen(store: string): StoreError {
  return new StoreError(`Store ${store} is not open`, {
    code: "store_not_open",
    context: { store },
    isOperational: false,
  })
}

export function retriesExhausted(op: string, run: ExhaustedRun, cause: unknown): StoreError {
  const context: ErrorContext = { op, ...run }

  return new StoreError(`${op} failed after ${run.attempts} attempts`, {
    code: "retries_exhausted",
    context,
    cause,
  })
}

export function writeFailed(op: string, cause: unknown): StoreError {
  return new StoreError(`Dispatched ${op} failed`, {
    code: "write_failed",
    context: { op },
    cause,
  })
}

export function scanFailed(cause: unknown): StoreError {
  return new StoreError("Scan ended with a failure", { code: "scan_failed", cause })
}

export function isStoreError<C extends StoreErrorCode>(
  error: unknown,
  code: C,
): error is StoreError & { code: C } {
  return error instanceof StoreError && error.code === code
}
