import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function isAppError(err: Error): err is AppError {
  return "code" in err && "context" in err && "isOperational" in err && "timestamp" in err
}

/**
 * Serialize any thrown value to a consistent shape, following `cause` links.
 *
 * - AppErrors keep code, context and timestamp
 * - other Errors get code "unknown" and are marked non-operational
 * - non-Error values are wrapped with the value in `context`
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const cause: unknown = err.cause
    const known = isAppError(err)

    return {
      name: err.name,
      code: known ? err.code : "unknown",
      message: err.message,
      context: known ? { ...err.context } : {},
      isOperational: known ? err.isOperational : false,
      timestamp: (known ? err.timestamp : new Date()).toISOString(),
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
