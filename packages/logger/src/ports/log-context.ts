/**
 * Well-known fields carried by configuration-assembly log entries.
 */
export type LogContext = {
  service: string
  module: string

  /** Resource prefix of the assembly run */
  prefix: string
  profile: string | null
  variant: string | null

  /** Logical resource name or file path */
  resource: string
  /** Identity of one raw source behind a resource (a file path) */
  sourceId: string
  /** Merge layer: "resources", "additional-files", "overrides", ... */
  layer: string
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
