export * from './logger'
export * from './debug-logger'
export * from './logger-factory'
