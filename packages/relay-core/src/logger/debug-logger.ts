import debug, { Debugger } from 'debug'
import { LogContext, Logger, LoggerLevel } from './logger'

/**
 * Writes through the `debug` package, so output is only shown for namespaces enabled
 * with `DEBUG`, eg: `DEBUG=stage-relay:stage:*`
 */
export class DebugLogger implements Logger {
  private readonly write: Debugger

  constructor(namespace: string) {
    this.write = debug(namespace)
  }

  get namespace(): string {
    return this.write.namespace
  }

  debug = (message: string, context?: LogContext): void => this.log('debug', message, context)
  info = (message: string, context?: LogContext): void => this.log('info', message, context)
  warn = (message: string, context?: LogContext): void => this.log('warn', message, context)
  error = (message: string, context?: LogContext): void => this.log('error', message, context)
  fatal = (message: string, context?: LogContext): void => this.log('fatal', message, context)

  private log(level: LoggerLevel, message: string, context: LogContext | undefined): void {
    if (context) {
      this.write('[%s] %s %O', level, message, context)
    } else {
      this.write('[%s] %s', level, message)
    }
  }
}
