import { decodeJson, decodeUtf8, JsonCodecOptions, StageDefinition, success } from '@stage-relay/core'
import { z } from 'zod'

/**
 * Forwards any JSON document unchanged. Payloads that parse are forwarded byte-for-byte;
 * a payload that only parses after repair is forwarded in its repaired form.
 */
export const relayStage = (options: JsonCodecOptions = {}): StageDefinition<Buffer, Buffer> => ({
  codec: {
    decode: (payload: Buffer): Buffer => {
      const document = decodeJson(payload, z.unknown(), options)
      return options.repairMalformedJson && !isJson(payload)
        ? Buffer.from(JSON.stringify(document))
        : payload
    },
    encode: (output: Buffer): Buffer => output
  },
  transform: async payload => success(payload)
})

const isJson = (payload: Buffer): boolean => {
  try {
    JSON.parse(decodeUtf8(payload))
    return true
  } catch {
    return false
  }
}
