/**
 * Reference ISA simulator (Spike) invocation
 */

export * from './args'
export * from './config'
export * from './errors'
export * from './runner'
