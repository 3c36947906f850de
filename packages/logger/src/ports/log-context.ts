export type LogContext = {
  service: string
  module: string
  env: string

  /** Logical store name */
  store: string

  /** Partition the store instance serves */
  partition: number

  /** Store operation (get, put, scan, ...) */
  op: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
