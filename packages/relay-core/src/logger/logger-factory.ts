import { DebugLogger } from './debug-logger'
import { Logger } from './logger'

/**
 * Every default logger is created under this `debug` namespace
 */
export const LOGGER_NAMESPACE = 'stage-relay'

/**
 * Creates the logger for a component, eg: `stage:translation` or `rabbitmq`
 */
export type LoggerFactory = (component: string) => Logger

const debugLoggers = new Map<string, DebugLogger>()

export const defaultLoggerFactory: LoggerFactory = component => {
  const namespace = `${LOGGER_NAMESPACE}:${component}`
  const existing = debugLoggers.get(namespace)
  if (existing) {
    return existing
  }
  const logger = new DebugLogger(namespace)
  debugLoggers.set(namespace, logger)
  return logger
}
