import { z, zAddress } from '@rvgold/core'
import type { Safe, SpikeConfig } from '@rvgold/types'
import { EXTRACT_ERRORS, safeError, safeResult } from '@rvgold/types'
import { SpikeError } from './errors'

export const DEFAULT_ISA = 'rv64g'
export const DEFAULT_RESET_PC = 0x40000000n
export const DEFAULT_MEMORY_BASE = 0x40000000n
export const DEFAULT_MEMORY_SIZE = 0x8000000n

export const SpikeConfigSchema = z.object({
  spike: z.string().min(1).default('spike'),
  elfPath: z.string().min(1, 'ELF path is required'),
  tracePath: z.string().min(1, 'Trace path is required'),
  isa: z
    .string()
    .regex(/^rv(32|64)[a-z0-9_]*$/i, 'ISA must look like rv64g or rv32imac')
    .default(DEFAULT_ISA),
  pc: zAddress.default(DEFAULT_RESET_PC),
  memoryBase: zAddress.default(DEFAULT_MEMORY_BASE),
  memorySize: zAddress
    .refine((size) => size > 0n, 'Memory size must be positive')
    .default(DEFAULT_MEMORY_SIZE),
  debug: z.boolean().default(false),
})

export type SpikeConfigInput = z.input<typeof SpikeConfigSchema>

export function createSpikeConfig(
  input: SpikeConfigInput,
): Safe<SpikeConfig, SpikeError> {
  const result = SpikeConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    return safeError(
      new SpikeError(
        `Invalid simulator configuration: ${issues}`,
        EXTRACT_ERRORS.INVALID_CONFIG,
        { issues: result.error.errors },
      ),
    )
  }

  const config: SpikeConfig = result.data
  return safeResult(config)
}
