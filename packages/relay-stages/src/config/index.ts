export * from './inference-endpoints'
export * from './relay-configuration'
