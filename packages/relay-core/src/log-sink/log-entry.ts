/**
 * Levels used by the engine itself. Transforms also log under their own
 * categories, eg: `TRANSLATION_ERROR`, so the level is an open string.
 */
export const LogLevel = {
  Info: 'INFO',
  Warning: 'WARNING',
  Error: 'ERROR'
} as const

export interface LogEntry {
  level: string
  message: string
}

export const DEFAULT_LOG_QUEUE = 'log_queue'
