import { serializeError } from 'serialize-error'
import { BrokerChannel, BrokerConnector } from '../broker'
import { ConnectivityError } from '../error'
import { LogLevel, LogSink } from '../log-sink'
import { Logger } from '../logger'
import { errorMessage } from '../util'

export type Consumption = { mode: 'poll' } | { mode: 'push'; prefetch: number }

export interface ConnectionSettings {
  name: string
  inputQueue: string
  outputQueue: string | undefined
  logQueue: string
  consumption: Consumption
}

/**
 * Owns the single broker channel of a stage. A channel is only handed out once the
 * stage's queues have been declared on it, and in push mode once consumption has started.
 */
export class ConnectionManager {
  private channel: BrokerChannel | undefined

  constructor(
    private readonly settings: ConnectionSettings,
    private readonly connector: BrokerConnector,
    private readonly logSink: LogSink,
    private readonly logger: Logger
  ) {}

  get activeChannel(): BrokerChannel | undefined {
    return this.channel?.isOpen ? this.channel : undefined
  }

  get isConnected(): boolean {
    return this.activeChannel !== undefined
  }

  /**
   * Returns the open channel, connecting and declaring queues first if there isn't one
   * @throws ConnectivityError if the broker can't be reached or the queues can't be set up
   */
  async ensureConnected(): Promise<BrokerChannel> {
    const active = this.activeChannel
    if (active) {
      return active
    }

    await this.teardown()
    await this.logSink.log(
      undefined,
      `Connecting stage '${this.settings.name}' to the broker`,
      LogLevel.Info
    )

    let channel: BrokerChannel | undefined
    try {
      channel = await this.connector.connect()
      await this.declareQueues(channel)
      if (this.settings.consumption.mode === 'push') {
        await channel.consume(this.settings.inputQueue, {
          prefetch: this.settings.consumption.prefetch
        })
      }
    } catch (error) {
      if (channel) {
        await this.close(channel)
      }
      await this.logSink.log(
        undefined,
        `Failed to connect to the broker: ${errorMessage(error)}`,
        LogLevel.Error
      )
      throw error instanceof ConnectivityError
        ? error
        : new ConnectivityError(`Failed to connect to the broker: ${errorMessage(error)}`, error)
    }

    this.channel = channel
    await this.logSink.log(
      channel,
      `Stage '${this.settings.name}' connected, consuming from '${this.settings.inputQueue}'`,
      LogLevel.Info
    )
    return channel
  }

  /**
   * Closes the current channel, if any. Never throws.
   */
  async teardown(): Promise<void> {
    const channel = this.channel
    this.channel = undefined
    if (channel) {
      await this.close(channel)
    }
  }

  private async declareQueues(channel: BrokerChannel): Promise<void> {
    const { inputQueue, outputQueue, logQueue } = this.settings
    const queues = [inputQueue, outputQueue, logQueue].filter(
      (queueName): queueName is string => queueName !== undefined
    )
    for (const queueName of queues) {
      await channel.declareQueue(queueName)
    }
  }

  private async close(channel: BrokerChannel): Promise<void> {
    try {
      await channel.close()
    } catch (error) {
      this.logger.debug('Ignoring error while closing broker channel', {
        error: serializeError(error)
      })
    }
  }
}
