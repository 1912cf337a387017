/**
 * Trace Extractor
 *
 * Reference simulator commit log -> expected memory data
 */

export * from './commit-log'
export * from './config'
export * from './errors'
export * from './extractor'
export * from './format'
export * from './region'
export * from './symbols'
export * from './writer'
