import { jsonCodec, StageDefinition } from '@stage-relay/core'
import { AxiosInstance } from 'axios'
import { z } from 'zod'
import { InferenceEndpoint } from '../config'
import { InferenceClient, InferenceLogLevel } from '../inference'

const translationInputSchema = z.object({
  recognized_text: z.string().min(1)
})

/**
 * The full translation service response is forwarded, the next stage reads `data.output_text`
 */
export const translationResponseSchema = z
  .object({
    status: z.literal('success'),
    data: z
      .object({
        output_text: z.string()
      })
      .passthrough()
  })
  .passthrough()
export type TranslationResponse = z.infer<typeof translationResponseSchema>

export interface TranslationStageOptions {
  repairMalformedJson?: boolean
  http?: AxiosInstance
}

export const translationStage = (
  endpoint: InferenceEndpoint,
  options: TranslationStageOptions = {}
): StageDefinition<z.infer<typeof translationInputSchema>, TranslationResponse> => {
  const client = new InferenceClient(
    endpoint,
    {
      label: 'Translation',
      successLevel: InferenceLogLevel.TranslationSuccess,
      failureLevel: InferenceLogLevel.TranslationError
    },
    options.http
  )

  return {
    codec: jsonCodec(translationInputSchema, translationResponseSchema, {
      repairMalformedJson: options.repairMalformedJson
    }),
    transform: async (input, log) =>
      client.post({ input_text: input.recognized_text }, translationResponseSchema, log)
  }
}
