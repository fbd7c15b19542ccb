export type MessageHeaders = { [key: string]: unknown }

/**
 * A message as delivered by the broker, prior to being acknowledged
 */
export interface BrokerMessage {
  /**
   * Assigned by the broker for this delivery. Valid for exactly one ack or nack
   * on the channel that received it.
   */
  deliveryTag: number

  /**
   * The opaque payload, exactly as it was published
   */
  content: Buffer

  headers: MessageHeaders

  /**
   * If the broker has delivered this message before, ie: it was returned via a nack
   */
  redelivered: boolean
}

export interface PublishOptions {
  headers?: MessageHeaders
  contentType?: string
}

export interface ConsumeOptions {
  /**
   * The maximum number of unacknowledged messages the broker pushes to this channel
   */
  prefetch: number
}

/**
 * A live channel to a durable, queue-based broker with manual acknowledgement.
 * Any operation that fails because the connection or channel is gone rejects
 * with a ConnectivityError.
 */
export interface BrokerChannel {
  /**
   * If the channel can still be used. Becomes false when the broker or network closes it.
   */
  readonly isOpen: boolean

  /**
   * Declares a durable queue. This is idempotent, and a conflict with an existing
   * queue's properties is tolerated.
   */
  declareQueue (queueName: string): Promise<void>

  /**
   * Polls a single message from the queue without auto-acknowledgement.
   * @returns undefined when the queue is empty
   */
  get (queueName: string): Promise<BrokerMessage | undefined>

  /**
   * Starts push-based consumption of a queue. Delivered messages are buffered and
   * handed out through `receive()`
   */
  consume (queueName: string, options: ConsumeOptions): Promise<void>

  /**
   * Waits up to `waitMs` for the next pushed message from `consume()`
   */
  receive (waitMs: number): Promise<BrokerMessage | undefined>

  /**
   * Publishes a persistent message to a queue, resolving once the broker has accepted it
   */
  publish (queueName: string, content: Buffer, options?: PublishOptions): Promise<void>

  ack (message: BrokerMessage): Promise<void>

  nack (message: BrokerMessage, requeue: boolean): Promise<void>

  close (): Promise<void>
}

/**
 * Establishes new connections to the broker. Each call yields a fresh channel
 * on a fresh connection.
 */
export interface BrokerConnector {
  connect (): Promise<BrokerChannel>
}
