#!/usr/bin/env node
import { defaultLoggerFactory, LOGGER_NAMESPACE } from '@stage-relay/core'
import { RabbitMqConnector } from '@stage-relay/rabbitmq'
import debug from 'debug'
import dotenv from 'dotenv'
import { serializeError } from 'serialize-error'
import { loadRelayConfiguration } from './config'
import { buildStage, isStageName, STAGE_NAMES } from './stage-catalog'

const logger = defaultLoggerFactory('main')

/**
 * Runs a single stage, named by the first argument, until the process is interrupted
 * @example stage-relay translation
 */
export const main = async (args: string[] = process.argv.slice(2)): Promise<void> => {
  dotenv.config()
  // DEBUG may only have been set by the .env file, after `debug` read the environment
  debug.enable(process.env.DEBUG || `${LOGGER_NAMESPACE}:*`)

  const [name] = args
  if (!name || !isStageName(name)) {
    throw new Error(`Usage: stage-relay <${STAGE_NAMES.join('|')}>`)
  }

  const configuration = loadRelayConfiguration()
  const connector = new RabbitMqConnector({ connectionString: configuration.brokerUrl })
  const stage = buildStage(name, {
    configuration,
    connector,
    repairMalformedJson: process.env.RELAY_REPAIR_JSON === 'true'
  })
  await stage.start()
}

if (require.main === module) {
  main().catch(error => {
    logger.fatal('Stage failed to start', { error: serializeError(error) })
    process.exitCode = 1
  })
}
