export type LogContext = {
  service: string
  module: string

  /** Database file the log line concerns. */
  path: string
  key: string
  operation: string
  isolation: string

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields added by `child()`; may override the parent's.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
