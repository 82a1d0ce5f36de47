export type LogContext = {
  /** CLI command path, e.g. "config add" */
  command: string
  profile: string
  /** Name of the active profile source, e.g. "yaml:/home/me/.modeldeck/config.yaml" */
  source: string
  path: string
  operation: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
