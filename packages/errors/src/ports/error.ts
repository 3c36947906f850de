/** Machine-readable error code; lowercase snake case by convention. */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (ids, operation names, counters)
 * so callers never parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (true) or programmer error / invariant violation
   * (false).
   *
   * @remarks
   * - Operational: invalid argument, end of sequence, remote store unavailable.
   * - Non-operational: using a closed store, corrupted state.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /** Underlying cause, see `Error.cause` */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
