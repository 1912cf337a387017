import type { Xlen } from '@rvgold/types'
import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error'])

export type LogLevel = z.infer<typeof logLevelSchema>

// Register width as written on the command line or in the environment
export const xlenSchema = z
  .enum(['32', '64'])
  .transform((val): Xlen => (val === '32' ? 32 : 64))

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: logLevelSchema.default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

// Build layout and toolchain defaults, formerly Makefile variables
export const rvgoldEnvSchema = baseEnvSchema.extend({
  RVGOLD_BUILD_DIR: z.string().min(1).default('build'),
  RVGOLD_LOG_DIR: z.string().min(1).default('log'),
  RVGOLD_XLEN: xlenSchema.default('64'),
  SPIKE: z.string().min(1).default('spike'),
})

export type RvgoldEnv = z.infer<typeof rvgoldEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @param source - Variables to validate, `process.env` by default
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<T> {
  // Load environment variables from .env file
  dotenvConfig({ path: envPath })

  // Validate and parse environment variables
  return schema.parse(source)
}

/**
 * Load the build layout and toolchain settings
 */
export function loadRvgoldEnv(
  envPath?: string,
  source: NodeJS.ProcessEnv = process.env,
): RvgoldEnv {
  return loadEnvVariables(rvgoldEnvSchema, envPath, source)
}

/**
 * Create a complete environment schema by extending the base schema
 * @param additionalSchema - Additional schema to extend the base schema with
 * @returns Combined schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
