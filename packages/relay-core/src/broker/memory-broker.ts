import { EventEmitter } from 'events'
import { ConnectivityError } from '../error'
import {
  BrokerChannel,
  BrokerConnector,
  BrokerMessage,
  ConsumeOptions,
  MessageHeaders,
  PublishOptions
} from './broker-channel'

interface StoredMessage {
  content: Buffer
  headers: MessageHeaders
  redelivered: boolean
}

interface Delivery {
  queueName: string
  message: StoredMessage
  channel: MemoryChannel
}

export type Settlement =
  | { deliveryTag: number; action: 'ack' }
  | { deliveryTag: number; action: 'nack'; requeue: boolean }

/**
 * An in-process broker with durable-queue semantics. This isn't intended for production
 * use as all messages are kept in memory; it stands in for a real broker in tests and
 * supports injecting connection and publish failures.
 */
export class MemoryBroker implements BrokerConnector {
  private queues = new Map<string, StoredMessage[]>()
  private unacknowledged = new Map<number, Delivery>()
  private openChannels: MemoryChannel[] = []
  private nextDeliveryTag = 1
  private pendingConnectFailures = 0
  private failingQueues = new Set<string>()
  private readonly _settlements: Settlement[] = []
  readonly pushed = new EventEmitter()

  /**
   * Total number of connections that have been attempted, including those that failed
   */
  connectAttempts = 0

  async connect(): Promise<BrokerChannel> {
    this.connectAttempts++
    if (this.pendingConnectFailures > 0) {
      this.pendingConnectFailures--
      throw new ConnectivityError('Connection refused by memory broker')
    }
    const channel = new MemoryChannel(this)
    this.openChannels.push(channel)
    return channel
  }

  /**
   * Causes the next `count` connection attempts to fail
   */
  failNextConnects(count: number): void {
    this.pendingConnectFailures = count
  }

  /**
   * Causes publishes to `queueName` to be rejected until `acceptPublishesTo` is called
   */
  rejectPublishesTo(queueName: string): void {
    this.failingQueues.add(queueName)
  }

  acceptPublishesTo(queueName: string): void {
    this.failingQueues.delete(queueName)
  }

  /**
   * Simulates a network failure by closing every open channel. Unacknowledged
   * messages are returned to their queues.
   */
  dropConnections(): void {
    this.openChannels.forEach(channel => this.closeChannel(channel))
  }

  /**
   * Places a message on a queue as an external producer would
   */
  enqueue(queueName: string, content: Buffer | string, headers: MessageHeaders = {}): void {
    this.store(queueName, {
      content: Buffer.isBuffer(content) ? content : Buffer.from(content),
      headers,
      redelivered: false
    })
  }

  hasQueue(queueName: string): boolean {
    return this.queues.has(queueName)
  }

  /**
   * Gets the number of messages waiting in a queue, excluding those in flight
   */
  depth(queueName: string): number {
    return this.queues.get(queueName)?.length ?? 0
  }

  /**
   * Returns a copy of the payloads waiting in a queue, oldest first
   */
  messages(queueName: string): Buffer[] {
    return (this.queues.get(queueName) ?? []).map(message => Buffer.from(message.content))
  }

  headersOf(queueName: string): MessageHeaders[] {
    return (this.queues.get(queueName) ?? []).map(message => ({ ...message.headers }))
  }

  get inFlightCount(): number {
    return this.unacknowledged.size
  }

  /**
   * Every ack and nack the broker has accepted, in the order they happened
   */
  get settlements(): Settlement[] {
    return [...this._settlements]
  }

  declare(queueName: string): void {
    if (!this.queues.has(queueName)) {
      this.queues.set(queueName, [])
    }
  }

  publish(queueName: string, content: Buffer, options: PublishOptions): void {
    if (this.failingQueues.has(queueName)) {
      throw new Error(`Publish to '${queueName}' was rejected by the memory broker`)
    }
    this.store(queueName, {
      content: Buffer.from(content),
      headers: { ...options.headers },
      redelivered: false
    })
  }

  take(queueName: string, channel: MemoryChannel): BrokerMessage | undefined {
    const message = this.queues.get(queueName)?.shift()
    if (!message) {
      return undefined
    }
    const deliveryTag = this.nextDeliveryTag++
    this.unacknowledged.set(deliveryTag, { queueName, message, channel })
    return {
      deliveryTag,
      content: Buffer.from(message.content),
      headers: { ...message.headers },
      redelivered: message.redelivered
    }
  }

  settle(settlement: Settlement, channel: MemoryChannel): void {
    const delivery = this.unacknowledged.get(settlement.deliveryTag)
    if (!delivery || delivery.channel !== channel) {
      // A real broker closes the channel with PRECONDITION_FAILED here
      this.closeChannel(channel)
      throw new ConnectivityError(`Unknown delivery tag ${settlement.deliveryTag}`)
    }
    this.unacknowledged.delete(settlement.deliveryTag)
    this._settlements.push(settlement)
    if (settlement.action === 'nack' && settlement.requeue) {
      this.requeue(delivery)
    }
  }

  closeChannel(channel: MemoryChannel): void {
    if (!channel.isOpen) {
      return
    }
    channel.markClosed()
    this.openChannels = this.openChannels.filter(open => open !== channel)
    Array.from(this.unacknowledged.entries())
      .filter(([, delivery]) => delivery.channel === channel)
      .forEach(([deliveryTag, delivery]) => {
        this.unacknowledged.delete(deliveryTag)
        this.requeue(delivery)
      })
  }

  unacknowledgedOn(channel: MemoryChannel): number {
    return Array.from(this.unacknowledged.values()).filter(
      delivery => delivery.channel === channel
    ).length
  }

  private requeue(delivery: Delivery): void {
    // Returned messages go back to the head of the queue, as with RabbitMQ
    this.declare(delivery.queueName)
    this.queues.get(delivery.queueName)?.unshift({ ...delivery.message, redelivered: true })
    this.pushed.emit('pushed', delivery.queueName)
  }

  private store(queueName: string, message: StoredMessage): void {
    this.declare(queueName)
    this.queues.get(queueName)?.push(message)
    this.pushed.emit('pushed', queueName)
  }
}

/**
 * A channel onto a MemoryBroker
 */
export class MemoryChannel implements BrokerChannel {
  private open = true
  private consumption: { queueName: string; options: ConsumeOptions } | undefined

  constructor(private readonly broker: MemoryBroker) {}

  get isOpen(): boolean {
    return this.open
  }

  markClosed(): void {
    this.open = false
  }

  async declareQueue(queueName: string): Promise<void> {
    this.assertOpen()
    this.broker.declare(queueName)
  }

  async get(queueName: string): Promise<BrokerMessage | undefined> {
    this.assertOpen()
    return this.broker.take(queueName, this)
  }

  async consume(queueName: string, options: ConsumeOptions): Promise<void> {
    this.assertOpen()
    this.broker.declare(queueName)
    this.consumption = { queueName, options }
  }

  async receive(waitMs: number): Promise<BrokerMessage | undefined> {
    this.assertOpen()
    const consumption = this.consumption
    if (!consumption) {
      throw new Error('receive() called before consume()')
    }

    const takeNext = () =>
      this.open && this.broker.unacknowledgedOn(this) < consumption.options.prefetch
        ? this.broker.take(consumption.queueName, this)
        : undefined

    const immediate = takeNext()
    if (immediate) {
      return immediate
    }

    return new Promise<BrokerMessage | undefined>(resolve => {
      const onPushed = (queueName: string) => {
        if (queueName !== consumption.queueName) {
          return
        }
        const message = takeNext()
        if (message) {
          unsubscribe()
          clearTimeout(timeoutToken)
          resolve(message)
        }
      }
      const unsubscribe = () => this.broker.pushed.off('pushed', onPushed)
      const timeoutToken = setTimeout(() => {
        unsubscribe()
        resolve(undefined)
      }, waitMs)
      this.broker.pushed.on('pushed', onPushed)
    })
  }

  async publish(queueName: string, content: Buffer, options: PublishOptions = {}): Promise<void> {
    this.assertOpen()
    this.broker.publish(queueName, content, options)
  }

  async ack(message: BrokerMessage): Promise<void> {
    this.assertOpen()
    this.broker.settle({ deliveryTag: message.deliveryTag, action: 'ack' }, this)
  }

  async nack(message: BrokerMessage, requeue: boolean): Promise<void> {
    this.assertOpen()
    this.broker.settle({ deliveryTag: message.deliveryTag, action: 'nack', requeue }, this)
  }

  async close(): Promise<void> {
    this.broker.closeChannel(this)
  }

  private assertOpen(): void {
    if (!this.open) {
      throw new ConnectivityError('Channel closed')
    }
  }
}
