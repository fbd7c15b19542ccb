export * from './connection-manager'
