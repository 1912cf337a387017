/**
 * Core Package
 *
 * Logger, environment configuration and shared utilities
 */

// Export environment loading
export * from './env'
// Export logger
export * from './logger'
// Export all utilities
export * from './utils'
// Export Zod schemas
export * from './zod'
