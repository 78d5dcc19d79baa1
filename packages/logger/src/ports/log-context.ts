/**
 * Well-known fields attached to log entries by the loaders and the host.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Printer instance name from the host registry. */
  instance: string

  /** Configuration file being loaded. */
  file: string
  section: string
  key: string
  line: number
  column: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields a child logger adds to (or overrides in) its parent's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
