import { Milliseconds } from '../backoff'
import { BrokerConnector } from '../broker'
import { Consumption } from '../connection'
import { StageAlreadyBuilt, StageConfigurationIncomplete } from '../error'
import { DEFAULT_LOG_QUEUE } from '../log-sink'
import { defaultLoggerFactory, LoggerFactory } from '../logger'
import { StageDefinition } from '../transform'
import { StageProcessor } from './stage-processor'

export const DEFAULT_IDLE_DELAY: Milliseconds = 1000
export const DEFAULT_UNEXPECTED_ERROR_DELAY: Milliseconds = 5000

export class StageConfigurationBuilder<TInput, TOutput> {
  private connector: BrokerConnector | undefined
  private inputQueue: string | undefined
  private outputQueue: string | undefined
  private logQueue = DEFAULT_LOG_QUEUE
  private consumption: Consumption = { mode: 'poll' }
  private idleDelayMs = DEFAULT_IDLE_DELAY
  private unexpectedErrorDelayMs = DEFAULT_UNEXPECTED_ERROR_DELAY
  private maxAttempts: number | undefined
  private loggerFactory: LoggerFactory = defaultLoggerFactory
  private interruptSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
  private stageProcessor: StageProcessor<TInput, TOutput> | undefined

  constructor(
    private readonly name: string,
    private readonly definition: StageDefinition<TInput, TOutput>
  ) {}

  /**
   * Constructs a stage processor from the configuration
   *
   * @throws StageAlreadyBuilt if called more than once
   * @throws StageConfigurationIncomplete if no connector or input queue has been configured
   */
  build(): StageProcessor<TInput, TOutput> {
    this.assertNotBuilt()
    if (!this.connector) {
      throw new StageConfigurationIncomplete(this.name, 'a broker connector')
    }
    if (!this.inputQueue) {
      throw new StageConfigurationIncomplete(this.name, 'an input queue')
    }

    const configuration = Object.freeze({
      name: this.name,
      inputQueue: this.inputQueue,
      outputQueue: this.outputQueue,
      logQueue: this.logQueue,
      definition: this.definition,
      consumption: Object.freeze({ ...this.consumption }),
      idleDelayMs: this.idleDelayMs,
      unexpectedErrorDelayMs: this.unexpectedErrorDelayMs,
      maxAttempts: this.maxAttempts,
      interruptSignals: Object.freeze([...this.interruptSignals])
    })
    this.stageProcessor = new StageProcessor(configuration, this.connector, this.loggerFactory)
    return this.stageProcessor
  }

  /**
   * The queue the stage consumes from. Malformed messages are moved to `<inputQueue>_malformedjson`
   */
  fromQueue(inputQueue: string): this {
    this.assertNotBuilt()
    this.inputQueue = inputQueue
    return this
  }

  /**
   * The queue successful transform outputs are published to. Omit for a terminal stage.
   */
  toQueue(outputQueue: string): this {
    this.assertNotBuilt()
    this.outputQueue = outputQueue
    return this
  }

  /**
   * @default log_queue
   */
  withLogQueue(logQueue: string): this {
    this.assertNotBuilt()
    this.logQueue = logQueue
    return this
  }

  withConnector(connector: BrokerConnector): this {
    this.assertNotBuilt()
    this.connector = connector
    return this
  }

  /**
   * Configures the stage to use a custom logger
   */
  withLogger(loggerFactory: LoggerFactory): this {
    this.assertNotBuilt()
    this.loggerFactory = loggerFactory
    return this
  }

  /**
   * Has the broker push messages to the stage rather than the stage polling for them
   * @param prefetch The number of unacknowledged messages the broker may push at once
   */
  withPushConsumption(prefetch = 1): this {
    this.assertNotBuilt()
    if (!Number.isInteger(prefetch) || prefetch < 1) {
      throw new Error('Invalid prefetch provided, must be a positive integer')
    }
    this.consumption = { mode: 'push', prefetch }
    return this
  }

  withIdleDelay(idleDelayMs: Milliseconds): this {
    this.assertNotBuilt()
    this.idleDelayMs = idleDelayMs
    return this
  }

  withUnexpectedErrorDelay(unexpectedErrorDelayMs: Milliseconds): this {
    this.assertNotBuilt()
    this.unexpectedErrorDelayMs = unexpectedErrorDelayMs
    return this
  }

  /**
   * Quarantines a message once its transform has failed this many times. By default failed
   * messages are redelivered indefinitely.
   */
  withMaxAttempts(maxAttempts: number): this {
    this.assertNotBuilt()
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error('Invalid maxAttempts provided, must be a positive integer')
    }
    this.maxAttempts = maxAttempts
    return this
  }

  /**
   * Replaces the process signals that gracefully stop the stage
   * @default ['SIGINT', 'SIGTERM']
   */
  withInterruptSignals(...signals: NodeJS.Signals[]): this {
    this.assertNotBuilt()
    this.interruptSignals = signals
    return this
  }

  private assertNotBuilt(): void {
    if (this.stageProcessor) {
      throw new StageAlreadyBuilt(this.name)
    }
  }
}
