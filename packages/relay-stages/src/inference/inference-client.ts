import {
  apiFailure,
  domainFailure,
  StageLog,
  success,
  TransformResult
} from '@stage-relay/core'
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios'
import { z } from 'zod'
import { InferenceEndpoint } from '../config'

const TOO_MANY_REQUESTS = 429

/**
 * Every inference service answers with this envelope, whether or not it succeeded
 */
export const inferenceResponseSchema = z
  .object({
    status: z.string(),
    message: z.string().optional(),
    data: z.unknown().optional()
  })
  .passthrough()

export interface RequestFailure {
  /**
   * `timeout`, `http:<code>` or `network`
   */
  reason: string
  description: string
}

/**
 * Classifies a failed axios request. Errors that didn't come from axios are rethrown.
 */
export const classifyRequestError = (error: unknown, timeoutMs: number): RequestFailure => {
  if (!axios.isAxiosError(error)) {
    throw error
  }
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return {
      reason: 'timeout',
      description: `Error: Request timed out after ${timeoutMs / 1000} seconds.`
    }
  }
  if (error.response) {
    const status = error.response.status
    return {
      reason: `http:${status}`,
      description:
        status === TOO_MANY_REQUESTS
          ? 'HTTP Error: Too Many Requests'
          : `HTTP Error: Request failed with status code ${status}`
    }
  }
  return { reason: 'network', description: `Request Error: ${error.message}` }
}

export interface InferenceLogging {
  /**
   * Prefixes every log message, eg: `Translation`
   */
  label: string
  successLevel: string
  failureLevel: string
}

/**
 * Posts requests to a single inference endpoint and classifies the outcome. Each call writes
 * exactly one entry to the stage log.
 */
export class InferenceClient {
  constructor(
    private readonly endpoint: InferenceEndpoint,
    private readonly logging: InferenceLogging,
    private readonly http: AxiosInstance = axios.create()
  ) {}

  /**
   * @param body A JSON-serializable value or FormData
   * @param responseSchema The shape a successful response must have
   */
  async post<TResponse>(
    body: unknown,
    responseSchema: z.ZodType<TResponse, z.ZodTypeDef, unknown>,
    log: StageLog
  ): Promise<TransformResult<TResponse>> {
    const { label, successLevel, failureLevel } = this.logging
    const config: AxiosRequestConfig = {
      headers: { 'access-token': this.endpoint.accessToken },
      timeout: this.endpoint.timeoutMs
    }

    let response: AxiosResponse<unknown>
    try {
      response = await this.http.post<unknown>(this.endpoint.apiEndpoint, body, config)
    } catch (error) {
      const failure = classifyRequestError(error, this.endpoint.timeoutMs)
      await log.log(`${label} ${failure.description}`, failureLevel)
      return apiFailure(failure.reason)
    }

    const envelope = inferenceResponseSchema.safeParse(response.data)
    if (!envelope.success) {
      await log.log(`${label} Error: Response is not a JSON object`, failureLevel)
      return domainFailure('Response is not a JSON object')
    }
    if (envelope.data.status !== 'success') {
      const reason = envelope.data.message ?? 'Unknown API error'
      await log.log(`${label} Error: API returned non-success status: ${reason}`, failureLevel)
      return domainFailure(reason)
    }

    const parsed = responseSchema.safeParse(response.data)
    if (!parsed.success) {
      const missing = parsed.error.issues.map(issue => issue.path.join('.')).join(', ')
      await log.log(`${label} Error: Response is missing expected data: ${missing}`, failureLevel)
      return domainFailure(`Response is missing expected data: ${missing}`)
    }

    await log.log(`${label} successful for ${this.endpoint.apiEndpoint}.`, successLevel)
    return success(parsed.data)
  }
}
