export type LogContext = {
  service: string
  module: string

  /** Value kind being converted, e.g. "duration" */
  kind: string
  /** Field path inside the host document, e.g. "retry.backoff" */
  path: string
  operation: "decode" | "encode"
}

export type LogEvent = {
  err: unknown
  reason: string
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
