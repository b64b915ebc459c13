export type LogContext = {
  service: string
  module: string

  /** Fragment identity being read or parsed */
  fragment: string
  /** Profile being activated */
  profile: string

  /** Process name a configuration is resolved for */
  process: string
  /** Retry attempt of that process, starting at 1 */
  attempt: number
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
