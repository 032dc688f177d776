/**
 * Fields a settings operation can attach to every log entry it emits.
 */
export type LogContext = {
  module: string
  store: string

  source: string
  format: string

  section: string
  parser: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
