/**
 * Fields a configuration run attaches to its log entries.
 */
export type LogContext = {
  component: string

  /** Source name, e.g. "json:settings.json" or "command-line" */
  source: string

  /** Configuration item name */
  item: string

  /** Resolution pass counter, starting at 1 for each resolver */
  pass: number
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
