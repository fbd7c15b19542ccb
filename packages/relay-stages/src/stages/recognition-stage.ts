import {
  decodeJson,
  encodeJson,
  MalformedPayload,
  StageCodec,
  StageDefinition,
  success
} from '@stage-relay/core'
import { AxiosInstance } from 'axios'
import { z } from 'zod'
import { InferenceEndpoint } from '../config'
import { InferenceClient, InferenceLogLevel } from '../inference'

const RIFF_HEADER = Buffer.from('RIFF')

/**
 * The upload front end may wrap the audio as hex in a JSON document
 */
const hexAudioSchema = z.object({
  audio_bytes_hex: z
    .string()
    .min(2)
    .regex(/^(?:[0-9a-fA-F]{2})+$/, 'Expected an even number of hex digits')
})

export const recognizedTextSchema = z.object({
  recognized_text: z.string()
})
export type RecognizedText = z.infer<typeof recognizedTextSchema>

const recognitionResponseSchema = z.object({
  data: z.object({
    recognized_text: z.string()
  })
})

export const recognitionCodec: StageCodec<Buffer, RecognizedText> = {
  decode: (payload: Buffer): Buffer => {
    if (payload.length === 0) {
      throw new MalformedPayload('Audio payload is empty', payload)
    }
    if (payload.subarray(0, RIFF_HEADER.length).equals(RIFF_HEADER)) {
      return payload
    }
    const { audio_bytes_hex } = decodeJson(payload, hexAudioSchema)
    return Buffer.from(audio_bytes_hex, 'hex')
  },
  encode: (output: RecognizedText): Buffer => encodeJson(output, recognizedTextSchema)
}

/**
 * Transcribes WAV audio by uploading it as the `audio_file` form field
 */
export const recognitionStage = (
  endpoint: InferenceEndpoint,
  http?: AxiosInstance
): StageDefinition<Buffer, RecognizedText> => {
  const client = new InferenceClient(
    endpoint,
    {
      label: 'ASR Inference',
      successLevel: InferenceLogLevel.AsrInference,
      failureLevel: InferenceLogLevel.AsrInference
    },
    http
  )

  return {
    codec: recognitionCodec,
    transform: async (audio, log) => {
      const form = new FormData()
      form.append('audio_file', new Blob([new Uint8Array(audio)], { type: 'audio/wav' }), 'audio.wav')

      const result = await client.post(form, recognitionResponseSchema, log)
      return result.kind === 'success'
        ? success({ recognized_text: result.value.data.recognized_text })
        : result
    }
  }
}
