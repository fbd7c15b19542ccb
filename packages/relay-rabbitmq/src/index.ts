export * from './amqp-ports'
export * from './rabbitmq-channel'
export * from './rabbitmq-connector'
export * from './rabbitmq-connector-configuration'
