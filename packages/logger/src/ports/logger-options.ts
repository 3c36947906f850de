import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 */
export type LoggerOptions = {
  /** Minimum level to emit; "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Human-readable output for local development. Production keeps structured
   * JSON lines.
   */
  prettify?: boolean
}
