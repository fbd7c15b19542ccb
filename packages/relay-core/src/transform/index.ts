export * from './transform-result'
export * from './transform'
export * from './json-codec'
