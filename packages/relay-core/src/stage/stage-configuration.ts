import { Milliseconds } from '../backoff'
import { ConnectionSettings } from '../connection'
import { StageDefinition } from '../transform'

/**
 * The immutable settings of a single stage, as produced by `Stage.configure().build()`
 */
export interface StageConfiguration<TInput, TOutput> extends ConnectionSettings {
  definition: StageDefinition<TInput, TOutput>
  /**
   * How long to wait before polling again when the input queue is empty. In push
   * mode this is how long each receive waits for a delivery.
   * @default 1000
   */
  idleDelayMs: Milliseconds
  /**
   * How long to pause the loop after an error that isn't a connectivity or transform failure
   * @default 5000
   */
  unexpectedErrorDelayMs: Milliseconds
  /**
   * When set, a message that fails its transform this many times is quarantined instead of
   * being redelivered indefinitely
   */
  maxAttempts: number | undefined
  interruptSignals: readonly NodeJS.Signals[]
}
