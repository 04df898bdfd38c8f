export type LogContext = {
  requestId: string
  traceId: string

  method: string
  path: string
  route: string

  service: string
  module: string
  env: string
}

export type LogOutcome = {
  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> =
  Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a child logger's bindings.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
