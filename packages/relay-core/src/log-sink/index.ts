export * from './log-entry'
export * from './log-sink'
