/**
 * Structured fields attached to a log line, eg: `{ queueName, error: serializeError(error) }`
 */
export interface LogContext {
  [field: string]: unknown
}

export type LogMethod = (message: string, context?: LogContext) => void

/**
 * Process-level diagnostics of the stage engine. Entries meant for the shared log
 * queue go through the `LogSink` instead, which falls back to this logger.
 */
export interface Logger {
  debug: LogMethod
  info: LogMethod
  warn: LogMethod
  error: LogMethod
  fatal: LogMethod
}

export type LoggerLevel = keyof Logger
