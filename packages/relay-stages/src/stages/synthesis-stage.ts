import { jsonCodec, StageDefinition } from '@stage-relay/core'
import { AxiosInstance } from 'axios'
import { z } from 'zod'
import { InferenceEndpoint } from '../config'
import { InferenceClient, InferenceLogLevel } from '../inference'

const synthesisInputSchema = z
  .object({
    data: z
      .object({
        output_text: z.string().min(1)
      })
      .passthrough()
  })
  .passthrough()

/**
 * The full synthesis service response is forwarded, delivery downloads `data.s3_url`
 */
export const synthesisResponseSchema = z
  .object({
    status: z.literal('success'),
    data: z
      .object({
        s3_url: z.string().min(1)
      })
      .passthrough()
  })
  .passthrough()
export type SynthesisResponse = z.infer<typeof synthesisResponseSchema>

export type VoiceGender = 'male' | 'female'

export interface SynthesisStageOptions {
  gender: VoiceGender
  repairMalformedJson?: boolean
  http?: AxiosInstance
}

export const synthesisStage = (
  endpoint: InferenceEndpoint,
  options: SynthesisStageOptions
): StageDefinition<z.infer<typeof synthesisInputSchema>, SynthesisResponse> => {
  const client = new InferenceClient(
    endpoint,
    {
      label: 'TTS',
      successLevel: InferenceLogLevel.TtsSuccess,
      failureLevel: InferenceLogLevel.TtsError
    },
    options.http
  )

  return {
    codec: jsonCodec(synthesisInputSchema, synthesisResponseSchema, {
      repairMalformedJson: options.repairMalformedJson
    }),
    transform: async (input, log) =>
      client.post({ text: input.data.output_text, gender: options.gender }, synthesisResponseSchema, log)
  }
}
