export * from './connectivity-error'
export * from './malformed-payload'
export * from './stage-already-built'
export * from './stage-configuration-incomplete'
export * from './invalid-stage-state'
