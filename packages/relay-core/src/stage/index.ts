export * from './stage'
export * from './stage-configuration'
export * from './stage-configuration-builder'
export * from './stage-processor'
export * from './stage-state'
