export * from './broker-channel'
export * from './memory-broker'
