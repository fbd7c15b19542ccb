import {
  apiFailure,
  jsonCodec,
  LogLevel,
  StageDefinition,
  StageLog,
  success,
  TransformResult
} from '@stage-relay/core'
import axios, { AxiosInstance } from 'axios'
import { z } from 'zod'
import { classifyRequestError } from '../inference'

const deliveryInputSchema = z
  .object({
    data: z
      .object({
        s3_url: z.string().min(1)
      })
      .passthrough()
  })
  .passthrough()

const deliveryReceiptSchema = z.object({
  audioUrl: z.string(),
  bytesDelivered: z.number().int().nonnegative()
})
export type DeliveryReceipt = z.infer<typeof deliveryReceiptSchema>

export interface DeliveryStageOptions {
  /**
   * Where the synthesized audio is posted, as `audio/wav`
   */
  endpoint: string
  timeoutMs: number
  http?: AxiosInstance
}

/**
 * Downloads synthesized audio and forwards it to the client endpoint. This is the terminal
 * stage, its receipt isn't published anywhere.
 */
export const deliveryStage = (
  options: DeliveryStageOptions
): StageDefinition<z.infer<typeof deliveryInputSchema>, DeliveryReceipt> => {
  const http = options.http ?? axios.create()

  const request = async <T>(
    log: StageLog,
    description: string,
    send: () => Promise<T>
  ): Promise<TransformResult<T>> => {
    try {
      return success(await send())
    } catch (error) {
      const failure = classifyRequestError(error, options.timeoutMs)
      await log.log(`Failed to ${description}: ${failure.description}`, LogLevel.Error)
      return apiFailure(failure.reason)
    }
  }

  return {
    codec: jsonCodec(deliveryInputSchema, deliveryReceiptSchema),
    transform: async (input, log) => {
      const audioUrl = input.data.s3_url
      const download = await request(log, `download audio from ${audioUrl}`, async () =>
        http.get<ArrayBuffer>(audioUrl, { responseType: 'arraybuffer', timeout: options.timeoutMs })
      )
      if (download.kind !== 'success') {
        return download
      }
      const audio = Buffer.from(download.value.data)

      const upload = await request(log, `deliver audio to ${options.endpoint}`, async () =>
        http.post<unknown>(options.endpoint, audio, {
          headers: { 'Content-Type': 'audio/wav' },
          timeout: options.timeoutMs
        })
      )
      if (upload.kind !== 'success') {
        return upload
      }

      await log.log(`Delivered ${audio.length} bytes of audio from ${audioUrl}`, LogLevel.Info)
      return success({ audioUrl, bytesDelivered: audio.length })
    }
  }
}
