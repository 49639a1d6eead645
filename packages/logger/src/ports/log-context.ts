/**
 * Fields a bootstrap log line is usually scoped by.
 */
export type LogContext = {
  /** Application name given to the bootstrap driver */
  app: string
  /** Lifecycle phase being notified */
  phase: string
  /** Startup or stop hook being executed */
  hook: string
  module: string
  env: string
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
