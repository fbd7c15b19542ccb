import { ConsumeMessage, GetMessage, Message, Options, Replies } from 'amqplib'

/*
  The parts of the amqplib connection and channel models used by the adapter. amqplib's own
  types satisfy these, and tests provide in-process fakes.
*/

export interface AmqpEvents {
  on (event: 'close' | 'error', listener: (error?: Error) => void): unknown
}

/**
 * A short-lived channel used to declare queues. The broker closes it on a declaration conflict.
 */
export interface AmqpDeclarationChannel extends AmqpEvents {
  assertQueue (queue: string, options?: Options.AssertQueue): Promise<Replies.AssertQueue>
  close (): Promise<void>
}

/**
 * A confirm-mode channel that carries all message traffic of a connection
 */
export interface AmqpChannel extends AmqpEvents {
  get (queue: string, options?: Options.Get): Promise<GetMessage | false>
  consume (
    queue: string,
    onMessage: (message: ConsumeMessage | null) => void,
    options?: Options.Consume
  ): Promise<Replies.Consume>
  prefetch (count: number): Promise<unknown>
  sendToQueue (queue: string, content: Buffer, options?: Options.Publish): boolean
  waitForConfirms (): Promise<void>
  ack (message: Message): void
  nack (message: Message, allUpTo?: boolean, requeue?: boolean): void
  close (): Promise<void>
}

export interface AmqpConnection extends AmqpEvents {
  createChannel (): Promise<AmqpDeclarationChannel>
  createConfirmChannel (): Promise<AmqpChannel>
  close (): Promise<void>
}

export type AmqpConnect = (
  connectionString: string,
  socketOptions: { timeout: number }
) => Promise<AmqpConnection>
