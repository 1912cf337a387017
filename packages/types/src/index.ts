/**
 * Centralized Type Definitions
 *
 * Shared interfaces, error codes and the Safe result tuple used across
 * the extractor, the simulator runner and the CLI.
 */

// CLI option types
export * from './cli'
// Extractor and simulator configuration
export * from './config'
// Error codes and exit statuses
export * from './errors'
// Safe types for error handling
export * from './safe'
// Trace and expected-data types
export * from './trace'
