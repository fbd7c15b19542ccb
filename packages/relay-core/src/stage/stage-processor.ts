import { serializeError } from 'serialize-error'
import { Milliseconds, ReconnectBackoff } from '../backoff'
import { BrokerChannel, BrokerConnector, BrokerMessage } from '../broker'
import { ConnectionManager, ConnectionSettings } from '../connection'
import { ConnectivityError, InvalidStageState, MalformedPayload } from '../error'
import { LogLevel, LogSink } from '../log-sink'
import { Logger, LoggerFactory } from '../logger'
import { QuarantineRouter } from '../quarantine'
import { describeFailure, TransformFailure } from '../transform'
import { errorMessage, InterruptibleSleep, interruptibleSleep, TypedEmitter } from '../util'
import { StageConfiguration } from './stage-configuration'
import { StageState } from './stage-state'

/**
 * Carries the number of times a message has failed its transform when `maxAttempts` is set
 */
export const ATTEMPT_HEADER = 'x-relay-attempt'

export enum IterationOutcome {
  /**
   * The broker was unavailable, no message was polled
   */
  Reconnecting = 'reconnecting',
  Idle = 'idle',
  /**
   * The transform output was published to the output queue and the input acknowledged
   */
  Forwarded = 'forwarded',
  /**
   * The input was acknowledged by a stage with no output queue
   */
  Acknowledged = 'acknowledged',
  Requeued = 'requeued',
  /**
   * The input was republished to the back of its queue with an incremented attempt count
   */
  Retried = 'retried',
  Quarantined = 'quarantined',
  Faulted = 'faulted'
}

export interface IterationResult {
  outcome: IterationOutcome
  /**
   * How long the loop should wait before the next iteration
   */
  delayMs: Milliseconds
}

export interface AfterAck {
  message: BrokerMessage
}

export interface AfterNack {
  message: BrokerMessage
  requeue: boolean
}

export interface AfterQuarantine {
  message: BrokerMessage
  deadLetterQueue: string
  reason: string
}

export interface OnError {
  error: unknown
  message?: BrokerMessage
}

/**
 * A stage that can be started and stopped, independent of its input and output types
 */
export interface StageRunner {
  readonly name: string
  readonly state: StageState
  readonly configuration: ConnectionSettings
  start (): Promise<void>
  stop (): Promise<void>
  tick (): Promise<IterationResult>
}

/**
 * Runs the connect, poll, transform, publish and acknowledge cycle of a single stage.
 * Messages are handled strictly one at a time, and every delivery is settled at most once.
 */
export class StageProcessor<TInput, TOutput> implements StageRunner {
  /**
   * Emitted after a delivery has been acknowledged
   */
  readonly afterAck = new TypedEmitter<AfterAck>()
  /**
   * Emitted after a delivery has been negatively acknowledged
   */
  readonly afterNack = new TypedEmitter<AfterNack>()
  /**
   * Emitted after a delivery has been copied to the dead-letter queue and acknowledged
   */
  readonly afterQuarantine = new TypedEmitter<AfterQuarantine>()
  /**
   * Emitted when an iteration fails with an unexpected error
   */
  readonly onError = new TypedEmitter<OnError>()

  private internalState = StageState.Stopped
  private running = false
  private loop: Promise<void> | undefined
  private pendingDelay: InterruptibleSleep | undefined
  private reportedEmptyQueue = false
  private signalListeners: { signal: NodeJS.Signals; listener: () => void }[] = []
  private readonly connection: ConnectionManager
  private readonly logSink: LogSink
  private readonly quarantineRouter: QuarantineRouter
  private readonly backoff = new ReconnectBackoff()
  private readonly logger: Logger

  constructor(
    readonly configuration: StageConfiguration<TInput, TOutput>,
    connector: BrokerConnector,
    loggerFactory: LoggerFactory
  ) {
    this.logger = loggerFactory(`stage:${configuration.name}`)
    this.logSink = new LogSink(configuration.logQueue, this.logger)
    this.connection = new ConnectionManager(configuration, connector, this.logSink, this.logger)
    this.quarantineRouter = new QuarantineRouter(configuration.inputQueue)
  }

  get name(): string {
    return this.configuration.name
  }

  /**
   * Gets the current state of the stage
   */
  get state(): StageState {
    return this.internalState
  }

  /**
   * Starts the processing loop. It runs until `stop()` is called or an interrupt signal is received,
   * and recovers from every error along the way.
   *
   * @throws InvalidStageState if the stage is already running
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new InvalidStageState(
        'Stage must be stopped before it can be started',
        this.state,
        [StageState.Stopped]
      )
    }
    this.running = true
    this.internalState = StageState.Disconnected
    this.subscribeToInterruptSignals()
    this.logger.info(`Stage '${this.name}' started`, {
      inputQueue: this.configuration.inputQueue,
      outputQueue: this.configuration.outputQueue
    })
    this.loop = this.applicationLoop()
  }

  /**
   * Stops the loop once the in-flight iteration completes, and closes the broker channel
   *
   * @throws InvalidStageState if the stage isn't running
   */
  async stop(): Promise<void> {
    if (!this.running) {
      throw new InvalidStageState(
        'Stage must be started before it can be stopped',
        this.state,
        [StageState.Disconnected, StageState.Connecting, StageState.Polling, StageState.Processing]
      )
    }
    this.logger.info(`Stage '${this.name}' stopping...`)
    this.running = false
    this.pendingDelay?.interrupt()
    await this.loop
    this.loop = undefined
    await this.connection.teardown()
    this.unsubscribeFromInterruptSignals()
    this.internalState = StageState.Stopped
    this.logger.info(`Stage '${this.name}' stopped`)
  }

  /**
   * Runs a single iteration of the loop. Never rejects: failures are reported through
   * the outcome and the delay the loop should observe before the next iteration.
   */
  async tick(): Promise<IterationResult> {
    let message: BrokerMessage | undefined
    try {
      if (!this.connection.isConnected) {
        this.internalState = StageState.Connecting
      }
      const channel = await this.connection.ensureConnected()
      this.backoff.reset()

      this.internalState = StageState.Polling
      message = await this.readNextMessage(channel)
      if (!message) {
        return await this.idle(channel)
      }

      this.reportedEmptyQueue = false
      this.internalState = StageState.Processing
      const outcome = await this.handleMessage(channel, message)
      this.internalState = StageState.Polling
      return { outcome, delayMs: 0 }
    } catch (error) {
      return error instanceof ConnectivityError
        ? this.reconnectAfter(error)
        : this.recoverFrom(error, message)
    }
  }

  private async applicationLoop(): Promise<void> {
    while (this.running) {
      const { delayMs } = await this.tick()

      if (delayMs > 0 && this.running) {
        this.pendingDelay = interruptibleSleep(delayMs)
        await this.pendingDelay.completion
        this.pendingDelay = undefined
      }
    }
  }

  private async readNextMessage(channel: BrokerChannel): Promise<BrokerMessage | undefined> {
    return this.configuration.consumption.mode === 'push'
      ? channel.receive(this.configuration.idleDelayMs)
      : channel.get(this.configuration.inputQueue)
  }

  private async idle(channel: BrokerChannel): Promise<IterationResult> {
    if (!this.reportedEmptyQueue) {
      this.reportedEmptyQueue = true
      await this.logSink.log(
        channel,
        `Input queue '${this.configuration.inputQueue}' is currently empty.`,
        LogLevel.Info
      )
    }
    // A push-mode receive has already waited for a delivery
    const delayMs = this.configuration.consumption.mode === 'push' ? 0 : this.configuration.idleDelayMs
    return { outcome: IterationOutcome.Idle, delayMs }
  }

  private async handleMessage(
    channel: BrokerChannel,
    message: BrokerMessage
  ): Promise<IterationOutcome> {
    const { codec, transform } = this.configuration.definition

    let input: TInput
    try {
      input = codec.decode(message.content)
    } catch (error) {
      if (error instanceof MalformedPayload) {
        return this.quarantine(channel, message, error.payload, `Malformed input: ${error.message}`)
      }
      throw error
    }

    // A transform that throws leaves the message unsettled, it returns to the queue on teardown
    const result = await transform(input, this.logSink.bind(channel))
    if (result.kind !== 'success') {
      return this.handleFailure(channel, message, result)
    }

    const outputQueue = this.configuration.outputQueue
    if (!outputQueue) {
      await this.ack(channel, message)
      return IterationOutcome.Acknowledged
    }

    let output: Buffer
    try {
      output = codec.encode(result.value)
    } catch (error) {
      if (error instanceof MalformedPayload) {
        return this.quarantine(channel, message, error.payload, `Malformed output: ${error.message}`)
      }
      throw error
    }

    try {
      await channel.publish(outputQueue, output)
    } catch (error) {
      await this.logSink.log(
        channel,
        `Failed to publish to '${outputQueue}': ${errorMessage(error)}`,
        LogLevel.Error
      )
      await this.nack(channel, message, true)
      return IterationOutcome.Requeued
    }

    await this.logSink.log(channel, `Successfully published to ${outputQueue}`, LogLevel.Info)
    await this.ack(channel, message)
    return IterationOutcome.Forwarded
  }

  private async handleFailure(
    channel: BrokerChannel,
    message: BrokerMessage,
    failure: TransformFailure
  ): Promise<IterationOutcome> {
    const { inputQueue, maxAttempts } = this.configuration
    const description = describeFailure(failure)

    if (maxAttempts === undefined) {
      await this.logSink.log(
        channel,
        `${description}. Returning message to '${inputQueue}'`,
        LogLevel.Warning
      )
      await this.nack(channel, message, true)
      return IterationOutcome.Requeued
    }

    const attempt = attemptsOf(message) + 1
    if (attempt >= maxAttempts) {
      return this.quarantine(
        channel,
        message,
        message.content,
        `${description}. Giving up after ${attempt} attempts`
      )
    }

    await this.logSink.log(
      channel,
      `${description}. Retrying (attempt ${attempt} of ${maxAttempts})`,
      LogLevel.Warning
    )
    try {
      await channel.publish(inputQueue, message.content, {
        headers: { ...message.headers, [ATTEMPT_HEADER]: attempt }
      })
    } catch (error) {
      await this.logSink.log(
        channel,
        `Failed to republish to '${inputQueue}': ${errorMessage(error)}`,
        LogLevel.Error
      )
      await this.nack(channel, message, true)
      return IterationOutcome.Requeued
    }
    await this.ack(channel, message)
    return IterationOutcome.Retried
  }

  private async quarantine(
    channel: BrokerChannel,
    message: BrokerMessage,
    payload: Buffer,
    reason: string
  ): Promise<IterationOutcome> {
    const outcome = await this.quarantineRouter.quarantine(channel, payload)
    if (outcome.kind === 'failed') {
      await this.logSink.log(
        channel,
        `${reason}. Failed to move message to '${outcome.deadLetterQueue}': ${errorMessage(outcome.error)}`,
        LogLevel.Error
      )
      await this.nack(channel, message, true)
      return IterationOutcome.Requeued
    }

    await this.logSink.log(
      channel,
      `${reason}. Message moved to '${outcome.deadLetterQueue}'`,
      LogLevel.Warning
    )
    await this.ack(channel, message)
    this.afterQuarantine.emit({ message, deadLetterQueue: outcome.deadLetterQueue, reason })
    return IterationOutcome.Quarantined
  }

  private async ack(channel: BrokerChannel, message: BrokerMessage): Promise<void> {
    await channel.ack(message)
    this.afterAck.emit({ message })
  }

  private async nack(channel: BrokerChannel, message: BrokerMessage, requeue: boolean): Promise<void> {
    await channel.nack(message, requeue)
    this.afterNack.emit({ message, requeue })
  }

  private async reconnectAfter(error: ConnectivityError): Promise<IterationResult> {
    await this.connection.teardown()
    this.internalState = StageState.Disconnected
    const delayMs = this.backoff.next()
    this.logger.warn('Broker connectivity lost', { error: serializeError(error) })
    await this.logSink.log(
      undefined,
      `Retrying connection in ${delayMs / 1000} seconds...`,
      LogLevel.Error
    )
    return { outcome: IterationOutcome.Reconnecting, delayMs }
  }

  private async recoverFrom(error: unknown, message: BrokerMessage | undefined): Promise<IterationResult> {
    const delayMs = this.configuration.unexpectedErrorDelayMs
    this.logger.error('Unexpected error in stage loop', {
      error: serializeError(error),
      deliveryTag: message?.deliveryTag
    })
    await this.logSink.log(
      this.connection.activeChannel,
      `Unexpected error: ${errorMessage(error)}. Retrying in ${delayMs / 1000} seconds...`,
      LogLevel.Error
    )
    this.onError.emit({ error, message })
    await this.connection.teardown()
    this.internalState = StageState.Disconnected
    return { outcome: IterationOutcome.Faulted, delayMs }
  }

  /**
   * Subscribes to the interrupt signals to gracefully stop the stage
   */
  private subscribeToInterruptSignals(): void {
    this.signalListeners = this.configuration.interruptSignals.map(signal => {
      const listener = () => {
        if (!this.running) {
          return
        }
        this.logger.info(`Received ${signal} signal. Stopping stage...`)
        this.stop().catch(error =>
          this.logger.error('Failed to stop stage', { error: serializeError(error) })
        )
      }
      process.once(signal, listener)
      return { signal, listener }
    })
  }

  private unsubscribeFromInterruptSignals(): void {
    this.signalListeners.forEach(({ signal, listener }) => process.off(signal, listener))
    this.signalListeners = []
  }
}

const attemptsOf = (message: BrokerMessage): number => {
  const attempts = message.headers[ATTEMPT_HEADER]
  return typeof attempts === 'number' && Number.isInteger(attempts) ? attempts : 0
}
