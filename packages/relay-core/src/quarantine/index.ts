export * from './quarantine-router'
