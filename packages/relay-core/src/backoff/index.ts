export * from './reconnect-backoff'
