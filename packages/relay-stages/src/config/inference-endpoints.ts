import { Milliseconds } from '@stage-relay/core'
import { InferenceEndpointNotConfigured } from '../error'
import { InferenceEndpointConfiguration, RelayConfiguration } from './relay-configuration'

export interface InferenceEndpoint {
  apiEndpoint: string
  accessToken: string
  timeoutMs: Milliseconds
}

const resolve = (
  service: string,
  endpoints: { [key: string]: InferenceEndpointConfiguration },
  key: string,
  timeoutSeconds: number
): InferenceEndpoint => {
  const endpoint = endpoints[key]
  if (!endpoint) {
    throw new InferenceEndpointNotConfigured(service, key, Object.keys(endpoints))
  }
  return { ...endpoint, timeoutMs: timeoutSeconds * 1000 }
}

/**
 * Key of the translation table entry for a language pair
 * @example translationDirection('english', 'hindi') === 'english_to_hindi'
 */
export const translationDirection = (inputLanguage: string, outputLanguage: string): string =>
  `${inputLanguage}_to_${outputLanguage}`

export const recognitionEndpoint = (configuration: RelayConfiguration): InferenceEndpoint =>
  resolve(
    'speech recognition',
    configuration.recognition,
    configuration.inputLanguage,
    configuration.timeouts.recognition
  )

export const translationEndpoint = (configuration: RelayConfiguration): InferenceEndpoint =>
  resolve(
    'translation',
    configuration.translation,
    translationDirection(configuration.inputLanguage, configuration.outputLanguage),
    configuration.timeouts.translation
  )

export const synthesisEndpoint = (configuration: RelayConfiguration): InferenceEndpoint =>
  resolve(
    'speech synthesis',
    configuration.synthesis,
    configuration.outputLanguage,
    configuration.timeouts.synthesis
  )
