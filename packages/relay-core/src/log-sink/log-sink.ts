import { serializeError } from 'serialize-error'
import { BrokerChannel } from '../broker'
import { Logger, LoggerLevel } from '../logger'
import { LogEntry, LogLevel } from './log-entry'

/**
 * A log handle bound to the channel that is active while a message is processed
 */
export interface StageLog {
  log (message: string, level: string): Promise<void>
}

/**
 * Best-effort publishing of log entries to the shared log queue. Never throws: when no
 * channel is available, or the publish fails, the entry goes to the process logger instead.
 */
export class LogSink {
  constructor(
    readonly logQueue: string,
    private readonly logger: Logger
  ) {}

  async log(channel: BrokerChannel | undefined, message: string, level: string): Promise<void> {
    if (!channel || !channel.isOpen) {
      this.fallback(message, level)
      return
    }

    const entry: LogEntry = { level, message }
    try {
      await channel.publish(this.logQueue, Buffer.from(JSON.stringify(entry)))
    } catch (error) {
      this.logger.warn(`Failed to publish log entry to '${this.logQueue}'`, {
        error: serializeError(error)
      })
      this.fallback(message, level)
    }
  }

  bind(channel: BrokerChannel | undefined): StageLog {
    return {
      log: async (message: string, level: string) => this.log(channel, message, level)
    }
  }

  private fallback(message: string, level: string): void {
    this.logger[processLevelOf(level)](`[${level}] ${message}`)
  }
}

/**
 * Maps an entry level, including category levels such as `TTS_ERROR`, to a process log level
 */
export const processLevelOf = (level: string): LoggerLevel => {
  if (level === LogLevel.Error || level.endsWith(`_${LogLevel.Error}`)) {
    return 'error'
  }
  if (level === LogLevel.Warning || level.endsWith(`_${LogLevel.Warning}`)) {
    return 'warn'
  }
  return 'info'
}
