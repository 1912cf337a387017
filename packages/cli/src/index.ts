#!/usr/bin/env tsx

import { loadRvgoldEnv, logger, z } from '@rvgold/core'
import { EXIT_CODES } from '@rvgold/types'
import { createProgram } from './program'

// Load .env and validate environment variables
let env: ReturnType<typeof loadRvgoldEnv>
try {
  env = loadRvgoldEnv()
} catch (error) {
  if (error instanceof z.ZodError) {
    logger.error('Invalid environment', {
      errors: error.errors.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
      })),
    })
    process.exit(EXIT_CODES.INVALID_CONFIG)
  }
  throw error
}

// Initialize logger
logger.init(env.LOG_LEVEL)

createProgram(env)
  .parseAsync(process.argv)
  .catch((error) => {
    logger.error('Unhandled error:', error)
    process.exitCode = 1
  })
