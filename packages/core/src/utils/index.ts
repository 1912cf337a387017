/**
 * Utility exports for core
 *
 * Re-export all utilities from the utils directory
 */

// Hex parsing and formatting
export * from './hex'
