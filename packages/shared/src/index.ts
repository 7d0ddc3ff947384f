export * from './command-policies.js'
export * from './command-run.js'
export * from './operation-names.js'
