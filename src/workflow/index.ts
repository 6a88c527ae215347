export * from './types.js'
export * from './polling.js'
export * from './workflow.js'
