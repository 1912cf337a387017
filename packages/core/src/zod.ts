export * as z from 'zod'

import { z } from 'zod'
import { parseHexBigInt } from './utils/hex'

/**
 * Hex string (`0x` prefix optional) parsed into a bigint
 */
export const zHexBigInt = z
  .string()
  .regex(/^(0x)?[a-fA-F0-9]+$/, 'Invalid hex string')
  .transform((val) => parseHexBigInt(val))

/**
 * Accepts either a bigint or a hex string
 */
export const zAddress = z.union([z.bigint().nonnegative(), zHexBigInt])
