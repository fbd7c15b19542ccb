import {
  BrokerConnector,
  defaultLoggerFactory,
  LoggerFactory,
  Stage,
  StageConfigurationBuilder,
  StageDefinition,
  StageRunner
} from '@stage-relay/core'
import { AxiosInstance } from 'axios'
import {
  recognitionEndpoint,
  RelayConfiguration,
  synthesisEndpoint,
  translationEndpoint
} from './config'
import { InvalidRelayConfiguration } from './error'
import { Queue } from './queues'
import {
  deliveryStage,
  recognitionStage,
  relayStage,
  synthesisStage,
  translationStage
} from './stages'

export const STAGE_NAMES = [
  'recognition',
  'asr-mt-relay',
  'translation',
  'mt-tts-relay',
  'synthesis',
  'delivery'
] as const

export type StageName = typeof STAGE_NAMES[number]

export const isStageName = (value: string): value is StageName =>
  STAGE_NAMES.some(name => name === value)

export interface StageDependencies {
  configuration: RelayConfiguration
  connector: BrokerConnector
  loggerFactory?: LoggerFactory
  /**
   * Used for all inference and delivery requests
   */
  http?: AxiosInstance
  /**
   * Attempt a best-effort repair of malformed JSON inputs before quarantining them
   * @default false
   */
  repairMalformedJson?: boolean
}

/**
 * Builds one of the stages of the relay from configuration
 * @throws InferenceEndpointNotConfigured if the stage's inference service has no endpoint for the configured languages
 */
export const buildStage = (name: StageName, dependencies: StageDependencies): StageRunner => {
  const { configuration, connector, http, repairMalformedJson } = dependencies

  const configure = <TInput, TOutput>(
    definition: StageDefinition<TInput, TOutput>,
    inputQueue: string
  ): StageConfigurationBuilder<TInput, TOutput> =>
    Stage.configure(name, definition)
      .fromQueue(inputQueue)
      .withLogQueue(configuration.logQueue)
      .withConnector(connector)
      .withLogger(dependencies.loggerFactory ?? defaultLoggerFactory)

  switch (name) {
    case 'recognition':
      return configure(recognitionStage(recognitionEndpoint(configuration), http), Queue.RecognitionInput)
        .toQueue(Queue.RecognitionOutput)
        .build()
    case 'asr-mt-relay':
      return configure(relayStage({ repairMalformedJson }), Queue.RecognitionOutput)
        .toQueue(Queue.TranslationInput)
        .build()
    case 'translation':
      return configure(
        translationStage(translationEndpoint(configuration), { repairMalformedJson, http }),
        Queue.TranslationInput
      )
        .toQueue(Queue.TranslationOutput)
        .build()
    case 'mt-tts-relay':
      return configure(relayStage({ repairMalformedJson }), Queue.TranslationOutput)
        .toQueue(Queue.SynthesisInput)
        .build()
    case 'synthesis':
      return configure(
        synthesisStage(synthesisEndpoint(configuration), {
          gender: configuration.gender,
          repairMalformedJson,
          http
        }),
        Queue.SynthesisInput
      )
        .toQueue(Queue.SynthesisOutput)
        .build()
    case 'delivery': {
      if (!configuration.delivery) {
        throw new InvalidRelayConfiguration('The delivery stage requires delivery.endpoint', 'delivery')
      }
      return configure(
        deliveryStage({
          endpoint: configuration.delivery.endpoint,
          timeoutMs: configuration.timeouts.delivery * 1000,
          http
        }),
        Queue.SynthesisOutput
      )
        .withPushConsumption(1)
        .build()
    }
  }
}
