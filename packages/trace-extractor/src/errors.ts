import { EXTRACT_ERRORS, type ErrorCode } from '@rvgold/types'

// Extraction error types
export class TraceExtractError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'TraceExtractError'
  }
}

/**
 * A line matched the memory-write grammar but its payload is malformed
 */
export class ParseError extends TraceExtractError {
  constructor(
    reason: string,
    public line: number,
    public raw: string,
  ) {
    super(`${reason} on line ${line}: ${raw.trim()}`, EXTRACT_ERRORS.PARSE_ERROR, {
      line,
      raw,
    })
    this.name = 'ParseError'
  }
}

/**
 * A required input (trace, symbol table) does not exist or cannot be read
 */
export class MissingInputError extends TraceExtractError {
  constructor(
    message: string,
    public path: string,
  ) {
    super(message, EXTRACT_ERRORS.MISSING_INPUT, { path })
    this.name = 'MissingInputError'
  }
}

export class ConfigError extends TraceExtractError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, EXTRACT_ERRORS.INVALID_CONFIG, context)
    this.name = 'ConfigError'
  }
}

export class WriteError extends TraceExtractError {
  constructor(
    message: string,
    public path: string,
  ) {
    super(message, EXTRACT_ERRORS.WRITE_FAILED, { path })
    this.name = 'WriteError'
  }
}
