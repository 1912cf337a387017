import { logger } from '@rvgold/core'
import { type ErrorCode, type ExitCode, getExitCode } from '@rvgold/types'

interface CodedError extends Error {
  code: ErrorCode
}

/**
 * Log a failed step and map it to the process exit status
 */
export function failWith(step: string, error: CodedError): ExitCode {
  logger.error(`${step} failed: ${error.message}`, {
    code: error.code,
    name: error.name,
  })
  return getExitCode(error.code)
}
