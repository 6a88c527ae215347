export * from './types.js'
export * from './codec.js'
export * from './matchers.js'
export * from './state-machine.js'
