import { StageLog } from '../log-sink'
import { TransformResult } from './transform-result'

/**
 * The stage-specific operation. Given a decoded input it calls out to an external
 * service and classifies the outcome; it should not throw for expected failures.
 */
export type Transform<TInput, TOutput> = (
  input: TInput,
  log: StageLog
) => Promise<TransformResult<TOutput>>

/**
 * Converts between the bytes on the queues and the typed values a transform works with.
 * Both directions throw MalformedPayload for values they can't handle.
 */
export interface StageCodec<TInput, TOutput> {
  decode (payload: Buffer): TInput
  encode (output: TOutput): Buffer
}

export interface StageDefinition<TInput, TOutput> {
  codec: StageCodec<TInput, TOutput>
  transform: Transform<TInput, TOutput>
}
