export * from './inference-endpoint-not-configured'
export * from './invalid-relay-configuration'
