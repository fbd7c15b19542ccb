import {
  BrokerChannel,
  BrokerMessage,
  ConnectivityError,
  ConsumeOptions,
  errorMessage,
  Logger,
  PublishOptions
} from '@stage-relay/core'
import { Message } from 'amqplib'
import { EventEmitter } from 'events'
import { serializeError } from 'serialize-error'
import * as uuid from 'uuid'
import { AmqpChannel, AmqpConnection } from './amqp-ports'

/**
 * AMQP reply code raised when a queue is redeclared with different properties
 */
const PRECONDITION_FAILED = 406

enum ConsumptionQueueEvent {
  Pushed = 'pushed',
  Closed = 'closed'
}

const isPreconditionFailed = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === PRECONDITION_FAILED

/**
 * A RabbitMQ connection and its confirm channel, exposed as a broker channel. Once the
 * broker or network closes either of them the channel is unusable and a new one must be connected.
 */
export class RabbitMqChannel implements BrokerChannel {
  private open = true
  private declaredQueues = new Set<string>()
  private deliveries = new Map<number, Message>()
  private consumptionQueue: Message[] = []
  private consumptionQueueEvents = new EventEmitter()

  constructor(
    private readonly connection: AmqpConnection,
    private readonly channel: AmqpChannel,
    private readonly logger: Logger
  ) {
    connection.on('error', error => this.logger.warn('RabbitMQ connection error', { error: serializeError(error) }))
    connection.on('close', () => this.markClosed('connection closed'))
    channel.on('error', error => this.logger.warn('RabbitMQ channel error', { error: serializeError(error) }))
    channel.on('close', () => this.markClosed('channel closed'))
  }

  get isOpen(): boolean {
    return this.open
  }

  async declareQueue(queueName: string): Promise<void> {
    this.assertOpen()
    if (this.declaredQueues.has(queueName)) {
      return
    }

    this.logger.debug('Asserting queue', { queueName })
    const declarationChannel = await this.guard(async () => this.connection.createChannel())
    declarationChannel.on('error', error =>
      this.logger.debug('Declaration channel closed', { queueName, error: serializeError(error) })
    )
    try {
      await declarationChannel.assertQueue(queueName, { durable: true })
      await declarationChannel.close()
    } catch (error) {
      if (!isPreconditionFailed(error)) {
        throw this.toConnectivityError(error)
      }
      this.logger.warn(`Queue '${queueName}' already exists with different properties, using it as-is`)
    }
    this.declaredQueues.add(queueName)
  }

  async get(queueName: string): Promise<BrokerMessage | undefined> {
    this.assertOpen()
    const message = await this.guard(async () => this.channel.get(queueName, { noAck: false }))
    return message ? this.track(message) : undefined
  }

  async consume(queueName: string, options: ConsumeOptions): Promise<void> {
    this.assertOpen()
    await this.guard(async () => {
      await this.channel.prefetch(options.prefetch)
      await this.channel.consume(
        queueName,
        message => {
          if (!message) {
            // The broker cancelled the consumer, eg: the queue was deleted
            this.markClosed('consumer cancelled')
            return
          }
          this.consumptionQueue.push(message)
          this.consumptionQueueEvents.emit(ConsumptionQueueEvent.Pushed)
        },
        { noAck: false }
      )
    })
  }

  async receive(waitMs: number): Promise<BrokerMessage | undefined> {
    this.assertOpen()
    const rabbitMessage = await new Promise<Message | undefined>(resolve => {
      const message = this.consumptionQueue.shift()
      if (message) {
        resolve(message)
        return
      }

      // No messages immediately available, so wait for one to be received
      const messageConsumedCallback = () => {
        const maybeMessage = this.consumptionQueue.shift()
        if (maybeMessage) {
          unsubscribe()
          resolve(maybeMessage)
        }
      }

      const closedCallback = () => {
        unsubscribe()
        resolve(undefined)
      }

      const unsubscribe = () => {
        clearTimeout(timeoutToken)
        this.consumptionQueueEvents.off(ConsumptionQueueEvent.Pushed, messageConsumedCallback)
        this.consumptionQueueEvents.off(ConsumptionQueueEvent.Closed, closedCallback)
      }

      const timeoutToken = setTimeout(closedCallback, waitMs)
      this.consumptionQueueEvents.on(ConsumptionQueueEvent.Pushed, messageConsumedCallback)
      this.consumptionQueueEvents.on(ConsumptionQueueEvent.Closed, closedCallback)
    })

    if (!rabbitMessage) {
      this.assertOpen()
      return undefined
    }
    return this.track(rabbitMessage)
  }

  async publish(queueName: string, content: Buffer, options: PublishOptions = {}): Promise<void> {
    this.assertOpen()
    await this.guard(async () => {
      this.channel.sendToQueue(queueName, content, {
        messageId: uuid.v4(),
        persistent: true,
        contentType: options.contentType,
        headers: options.headers
      })
      await this.channel.waitForConfirms()
    })
  }

  async ack(message: BrokerMessage): Promise<void> {
    const rawMessage = this.settle(message)
    await this.guard(async () => this.channel.ack(rawMessage))
  }

  async nack(message: BrokerMessage, requeue: boolean): Promise<void> {
    const rawMessage = this.settle(message)
    await this.guard(async () => this.channel.nack(rawMessage, false, requeue))
  }

  async close(): Promise<void> {
    if (!this.open) {
      return
    }
    this.markClosed('closed by client')
    // Closing the connection closes its channels, returning unacknowledged messages to their queues
    await this.guard(async () => this.connection.close())
  }

  private track(message: Message): BrokerMessage {
    const deliveryTag = message.fields.deliveryTag
    this.deliveries.set(deliveryTag, message)
    return {
      deliveryTag,
      content: message.content,
      headers: { ...message.properties.headers },
      redelivered: message.fields.redelivered
    }
  }

  private settle(message: BrokerMessage): Message {
    this.assertOpen()
    const rawMessage = this.deliveries.get(message.deliveryTag)
    if (!rawMessage) {
      throw new ConnectivityError(`Delivery tag ${message.deliveryTag} is not outstanding on this channel`)
    }
    this.deliveries.delete(message.deliveryTag)
    return rawMessage
  }

  private markClosed(reason: string): void {
    if (!this.open) {
      return
    }
    this.logger.info('RabbitMQ channel closed', { reason })
    this.open = false
    // Unacknowledged deliveries are returned to their queues by the broker
    this.deliveries.clear()
    this.consumptionQueue = []
    this.consumptionQueueEvents.emit(ConsumptionQueueEvent.Closed)
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new ConnectivityError('RabbitMQ channel is closed')
    }
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation()
    } catch (error) {
      throw this.toConnectivityError(error)
    }
  }

  private toConnectivityError(error: unknown): ConnectivityError {
    return error instanceof ConnectivityError
      ? error
      : new ConnectivityError(`RabbitMQ operation failed: ${errorMessage(error)}`, error)
  }
}
