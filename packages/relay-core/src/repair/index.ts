export * from './json-repair'
