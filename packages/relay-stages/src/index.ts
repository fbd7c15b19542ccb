export * from './config'
export * from './error'
export * from './inference'
export * from './queues'
export * from './stage-catalog'
export * from './stages'
