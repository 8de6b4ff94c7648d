/**
 * Well-known fields attached to configuration log entries.
 *
 * - `module`: subsystem emitting the entry ("config", "include", "defaults")
 * - `kind`: subset kind being composed
 * - `component`: component subtree selected from a document
 * - `file`: absolute path of the document being read
 * - `keyPath`: delimited key path the entry refers to
 * - `delimiter`: delimiter chosen when rendering key paths
 */
export type LogContext = {
  module: string
  kind: string
  component: string
  file: string
  keyPath: string
  delimiter: string
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
