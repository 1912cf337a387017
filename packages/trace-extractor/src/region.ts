import { isValidHexNumber, parseHexBigInt } from '@rvgold/core'
import type { AddressRegion, MemoryWriteEvent, Safe } from '@rvgold/types'
import { safeError, safeResult } from '@rvgold/types'
import { ConfigError } from './errors'

/**
 * Keep writes whose address lies in [start, end), preserving execution order
 * Without a region every write is kept
 */
export function filterToRegion(
  events: MemoryWriteEvent[],
  region?: AddressRegion,
): MemoryWriteEvent[] {
  if (!region) {
    return events
  }
  return events.filter((event) => isInRegion(event.address, region))
}

export function isInRegion(address: bigint, region: AddressRegion): boolean {
  return address >= region.start && address < region.end
}

/**
 * Parse a `<start>:<end>` region given on the command line, both in hex
 */
export function parseRegion(value: string): Safe<AddressRegion, ConfigError> {
  const parts = value.split(':')
  if (parts.length !== 2) {
    return safeError(
      new ConfigError(`Region must be <start>:<end>, got "${value}"`),
    )
  }

  const [startToken = '', endToken = ''] = parts
  if (!isValidHexNumber(startToken) || !isValidHexNumber(endToken)) {
    return safeError(
      new ConfigError(`Region bounds must be hex numbers, got "${value}"`),
    )
  }

  return validateRegion({
    start: parseHexBigInt(startToken),
    end: parseHexBigInt(endToken),
  })
}

export function validateRegion(
  region: AddressRegion,
): Safe<AddressRegion, ConfigError> {
  if (region.start > region.end) {
    return safeError(
      new ConfigError(
        `Region start 0x${region.start.toString(16)} exceeds end 0x${region.end.toString(16)}`,
        { start: region.start, end: region.end },
      ),
    )
  }
  return safeResult(region)
}
