export * from './delivery-stage'
export * from './recognition-stage'
export * from './relay-stage'
export * from './synthesis-stage'
export * from './translation-stage'
