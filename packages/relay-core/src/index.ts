export * from './backoff'
export * from './broker'
export * from './connection'
export * from './error'
export * from './log-sink'
export * from './logger'
export * from './quarantine'
export * from './repair'
export * from './stage'
export * from './transform'
export * from './util'
