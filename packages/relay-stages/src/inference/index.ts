export * from './inference-client'
export * from './inference-log-level'
