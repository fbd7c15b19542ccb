import { apiFailure, domainFailure, success } from '@stage-relay/core'
import axios from 'axios'
import { z } from 'zod'
import {
  axiosResponse,
  httpError,
  networkError,
  recordingStageLog,
  RecordingStageLog,
  testEndpoint,
  timeoutError
} from '../../test/http-fixtures'
import { classifyRequestError, InferenceClient } from './inference-client'

describe('InferenceClient', () => {
  const responseSchema = z.object({ data: z.object({ output_text: z.string() }) })
  const http = axios.create()
  const post = jest.spyOn(http, 'post')
  const sut = new InferenceClient(
    testEndpoint('translate'),
    { label: 'Translation', successLevel: 'TRANSLATION_SUCCESS', failureLevel: 'TRANSLATION_ERROR' },
    http
  )
  let log: RecordingStageLog

  beforeEach(() => {
    post.mockReset()
    log = recordingStageLog()
  })

  describe('when the service succeeds', () => {
    beforeEach(() => {
      post.mockResolvedValue(axiosResponse({ status: 'success', data: { output_text: 'namaste' } }))
    })

    it('should return the parsed response', async () => {
      const result = await sut.post({ input_text: 'hello' }, responseSchema, log)
      expect(result).toEqual(success({ data: { output_text: 'namaste' } }))
    })

    it('should authenticate with the access token and apply the timeout', async () => {
      await sut.post({ input_text: 'hello' }, responseSchema, log)
      expect(post).toHaveBeenCalledWith(
        'https://inference.test/translate',
        { input_text: 'hello' },
        { headers: { 'access-token': 'test-token' }, timeout: 60000 }
      )
    })

    it('should write a single success entry', async () => {
      await sut.post({ input_text: 'hello' }, responseSchema, log)
      expect(log.log.mock.calls).toEqual([
        ['Translation successful for https://inference.test/translate.', 'TRANSLATION_SUCCESS']
      ])
    })
  })

  describe('when the service reports a non-success status', () => {
    it('should return a domain failure with the service message', async () => {
      post.mockResolvedValue(axiosResponse({ status: 'error', message: 'Model is loading' }))

      await expect(sut.post({}, responseSchema, log)).resolves.toEqual(domainFailure('Model is loading'))
      expect(log.log.mock.calls).toEqual([
        ['Translation Error: API returned non-success status: Model is loading', 'TRANSLATION_ERROR']
      ])
    })

    it('should fall back to a generic reason', async () => {
      post.mockResolvedValue(axiosResponse({ status: 'failed' }))
      await expect(sut.post({}, responseSchema, log)).resolves.toEqual(domainFailure('Unknown API error'))
    })
  })

  describe('when a successful response is missing data', () => {
    it('should return a domain failure naming the missing field', async () => {
      post.mockResolvedValue(axiosResponse({ status: 'success', data: {} }))

      await expect(sut.post({}, responseSchema, log)).resolves.toEqual(
        domainFailure('Response is missing expected data: data.output_text')
      )
      expect(log.log).toHaveBeenCalledTimes(1)
    })
  })

  describe('when the response is not a JSON object', () => {
    it('should return a domain failure', async () => {
      post.mockResolvedValue(axiosResponse('<html>Bad Gateway</html>'))
      await expect(sut.post({}, responseSchema, log)).resolves.toEqual(
        domainFailure('Response is not a JSON object')
      )
    })
  })

  describe('when the request fails', () => {
    it.each([
      ['a timeout', timeoutError(), 'timeout', 'Translation Error: Request timed out after 60 seconds.'],
      ['a rate limit', httpError(429), 'http:429', 'Translation HTTP Error: Too Many Requests'],
      [
        'a server error',
        httpError(503),
        'http:503',
        'Translation HTTP Error: Request failed with status code 503'
      ],
      [
        'a network error',
        networkError(),
        'network',
        'Translation Request Error: getaddrinfo ENOTFOUND inference.test'
      ]
    ])('should classify %s', async (_, error, reason, message) => {
      post.mockRejectedValue(error)

      await expect(sut.post({}, responseSchema, log)).resolves.toEqual(apiFailure(reason))
      expect(log.log.mock.calls).toEqual([[message, 'TRANSLATION_ERROR']])
    })
  })
})

describe('classifyRequestError', () => {
  it('should rethrow errors that did not come from axios', () => {
    const error = new TypeError('Cannot read properties of undefined')
    expect(() => classifyRequestError(error, 1000)).toThrow(error)
  })

  it('should treat ETIMEDOUT as a timeout', () => {
    const error = timeoutError()
    error.code = 'ETIMEDOUT'
    expect(classifyRequestError(error, 30000)).toEqual({
      reason: 'timeout',
      description: 'Error: Request timed out after 30 seconds.'
    })
  })
})
