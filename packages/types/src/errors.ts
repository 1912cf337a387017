/**
 * Error Constants
 *
 * Centralized error codes used by the extractor, the simulator runner and the CLI.
 * The CLI maps each code to a process exit status.
 */

/**
 * Trace extraction error codes
 */
export const EXTRACT_ERRORS = {
  PARSE_ERROR: 'PARSE_ERROR',
  MISSING_INPUT: 'MISSING_INPUT',
  INVALID_CONFIG: 'INVALID_CONFIG',
  WRITE_FAILED: 'WRITE_FAILED',
} as const

/**
 * Reference simulator error codes
 */
export const SPIKE_ERRORS = {
  SPIKE_FAILED: 'SPIKE_FAILED',
} as const

export const ALL_ERRORS = {
  ...EXTRACT_ERRORS,
  ...SPIKE_ERRORS,
} as const

export type ErrorCode = (typeof ALL_ERRORS)[keyof typeof ALL_ERRORS]

/**
 * Process exit statuses surfaced to the calling build orchestration
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  PARSE_ERROR: 1,
  PRECONDITION_FAILED: 2,
  INVALID_CONFIG: 3,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export const ERROR_EXIT_CODES: Record<ErrorCode, ExitCode> = {
  PARSE_ERROR: EXIT_CODES.PARSE_ERROR,
  MISSING_INPUT: EXIT_CODES.PRECONDITION_FAILED,
  INVALID_CONFIG: EXIT_CODES.INVALID_CONFIG,
  WRITE_FAILED: EXIT_CODES.PRECONDITION_FAILED,
  SPIKE_FAILED: EXIT_CODES.PRECONDITION_FAILED,
}

export function getExitCode(code: ErrorCode): ExitCode {
  return ERROR_EXIT_CODES[code]
}
