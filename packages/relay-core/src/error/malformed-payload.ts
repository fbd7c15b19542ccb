/**
 * Raised by a stage codec when a payload can't be decoded into the stage's input
 * type, or when a transform result can't be encoded for the output queue.
 *
 * @param payload The bytes that should be copied to the dead-letter queue
 */
export class MalformedPayload extends Error {
  constructor(
    message: string,
    readonly payload: Buffer
  ) {
    super(message)

    Object.setPrototypeOf(this, new.target.prototype)
  }
}
