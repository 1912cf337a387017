import { z, zAddress } from '@rvgold/core'
import type { ExtractorConfig, Safe } from '@rvgold/types'
import { safeError, safeResult } from '@rvgold/types'
import { ConfigError } from './errors'

export const DEFAULT_BEGIN_SYMBOL = 'begin_signature'
export const DEFAULT_END_SYMBOL = 'end_signature'

export const ExtractorConfigSchema = z.object({
  tracePath: z.string().min(1, 'Trace path is required'),
  outputPath: z.string().min(1, 'Output path is required'),
  xlen: z.union([z.literal(32), z.literal(64)]).default(64),
  format: z.enum(['flat', 'annotated']).default('flat'),
  region: z
    .object({ start: zAddress, end: zAddress })
    .refine((region) => region.start <= region.end, {
      message: 'Region start must not exceed region end',
    })
    .optional(),
  symbolFile: z.string().min(1).optional(),
  beginSymbol: z.string().min(1).default(DEFAULT_BEGIN_SYMBOL),
  endSymbol: z.string().min(1).default(DEFAULT_END_SYMBOL),
})

export type ExtractorConfigInput = z.input<typeof ExtractorConfigSchema>

/**
 * Validate an extractor configuration and fill in defaults
 */
export function createExtractorConfig(
  input: ExtractorConfigInput,
): Safe<ExtractorConfig, ConfigError> {
  const result = ExtractorConfigSchema.safeParse(input)
  if (!result.success) {
    return safeError(
      new ConfigError(
        `Invalid extractor configuration: ${formatIssues(result.error)}`,
        { issues: result.error.errors },
      ),
    )
  }

  const config: ExtractorConfig = result.data
  return safeResult(config)
}

export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ')
}
