import { errorMessage } from '@stage-relay/core'
import { readFileSync } from 'fs'
import { z } from 'zod'
import { InvalidRelayConfiguration } from '../error'

export const DEFAULT_CONFIG_PATH = 'config/relay.json'

const inferenceEndpointSchema = z.object({
  apiEndpoint: z.string().url(),
  accessToken: z.string().min(1)
})

export const relayConfigurationSchema = z.object({
  brokerUrl: z.string().min(1),
  logQueue: z.string().min(1).default('log_queue'),
  inputLanguage: z.string().min(1),
  outputLanguage: z.string().min(1),
  gender: z.enum(['male', 'female']).default('male'),
  /**
   * Request timeouts, in seconds
   */
  timeouts: z
    .object({
      recognition: z.number().positive().default(60),
      translation: z.number().positive().default(60),
      synthesis: z.number().positive().default(60),
      delivery: z.number().positive().default(30)
    })
    .default({}),
  recognition: z.record(inferenceEndpointSchema).default({}),
  translation: z.record(inferenceEndpointSchema).default({}),
  synthesis: z.record(inferenceEndpointSchema).default({}),
  delivery: z
    .object({
      endpoint: z.string().url()
    })
    .optional()
})

export type RelayConfiguration = z.infer<typeof relayConfigurationSchema>
export type InferenceEndpointConfiguration = z.infer<typeof inferenceEndpointSchema>

const environmentOverrides = (env: NodeJS.ProcessEnv): { [key: string]: string } => {
  const overrides = {
    brokerUrl: env.BROKER_URL,
    inputLanguage: env.RELAY_INPUT_LANG,
    outputLanguage: env.RELAY_OUTPUT_LANG,
    gender: env.RELAY_GENDER
  }
  return Object.fromEntries(
    Object.entries(overrides).filter((entry): entry is [string, string] => !!entry[1])
  )
}

/**
 * Validates a parsed configuration document, applying environment overrides first
 * @throws InvalidRelayConfiguration
 */
export const parseRelayConfiguration = (
  document: unknown,
  env: NodeJS.ProcessEnv,
  source: string
): RelayConfiguration => {
  const merged =
    typeof document === 'object' && document !== null && !Array.isArray(document)
      ? { ...document, ...environmentOverrides(env) }
      : document

  const result = relayConfigurationSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InvalidRelayConfiguration(`Invalid relay configuration in ${source}: ${issues}`, source)
  }
  return result.data
}

/**
 * Reads the configuration file named by RELAY_CONFIG, or config/relay.json
 * @throws InvalidRelayConfiguration if the file can't be read or is invalid
 */
export const loadRelayConfiguration = (env: NodeJS.ProcessEnv = process.env): RelayConfiguration => {
  const source = env.RELAY_CONFIG || DEFAULT_CONFIG_PATH
  let document: unknown
  try {
    document = JSON.parse(readFileSync(source, 'utf8'))
  } catch (error) {
    throw new InvalidRelayConfiguration(`Unable to read relay configuration: ${errorMessage(error)}`, source)
  }
  return parseRelayConfiguration(document, env, source)
}
