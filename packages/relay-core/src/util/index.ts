export * from './error-message'
export * from './sleep'
export * from './typed-emitter'
