export type LogContext = {
  module: string

  /** Name of the configuration class being bound */
  configType: string
  /** Normalized key prefix of the current build, without the trailing separator */
  prefix: string
  problemKind: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into the context of a child logger.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
