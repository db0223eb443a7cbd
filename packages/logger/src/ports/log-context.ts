/**
 * Well-known fields attached to resolution logs. Everything is optional at
 * the call site; unknown fields are allowed too.
 */
export type LogContext = {
  service: string
  module: string

  environment: string
  variant: string
  baseDir: string

  /** Provenance id of a config source, e.g. "shared.local" */
  source: string
  file: string
  variable: string

  durationMs: number
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
