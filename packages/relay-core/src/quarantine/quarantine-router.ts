import { BrokerChannel } from '../broker'

export const MALFORMED_QUEUE_SUFFIX = '_malformedjson'

/**
 * Gets the name of the dead-letter queue that holds messages a stage could not interpret
 * @example deadLetterQueueFor('MT_input') === 'MT_input_malformedjson'
 */
export const deadLetterQueueFor = (queueName: string): string =>
  `${queueName}${MALFORMED_QUEUE_SUFFIX}`

export type QuarantineOutcome =
  | { kind: 'quarantined'; deadLetterQueue: string }
  | { kind: 'failed'; deadLetterQueue: string; error: unknown }

/**
 * Copies payloads that a stage can't interpret to its dead-letter queue. The caller decides
 * how to settle the original message.
 */
export class QuarantineRouter {
  readonly deadLetterQueue: string

  constructor(inputQueue: string) {
    this.deadLetterQueue = deadLetterQueueFor(inputQueue)
  }

  async quarantine(channel: BrokerChannel, payload: Buffer): Promise<QuarantineOutcome> {
    try {
      await channel.declareQueue(this.deadLetterQueue)
      await channel.publish(this.deadLetterQueue, payload)
      return { kind: 'quarantined', deadLetterQueue: this.deadLetterQueue }
    } catch (error) {
      return { kind: 'failed', deadLetterQueue: this.deadLetterQueue, error }
    }
  }
}
