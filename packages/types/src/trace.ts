/**
 * Trace Types
 *
 * Types for commit-log traces of the reference ISA simulator and the
 * expected-data artifact derived from them.
 */

/**
 * Target register width in bits
 */
export type Xlen = 32 | 64

/**
 * Output record layout
 * - `flat`: one fixed-width value per line
 * - `annotated`: `@<address> <value>` per line
 */
export type ExpectedDataFormat = 'flat' | 'annotated'

/**
 * Parsed memory write from a single commit-log line
 */
export interface MemoryWriteEvent {
  /** 1-based line number in the trace */
  lineNumber: number
  /** Byte address written */
  address: bigint
  /** Written value, lower-case hex without prefix, zero-padded to the XLEN width */
  value: string
  raw: string
}

/**
 * Half-open byte range [start, end)
 */
export interface AddressRegion {
  start: bigint
  end: bigint
}

export type ExtractionStatus = 'ok' | 'no-writes'

export interface ExtractionResult {
  status: ExtractionStatus
  /** Writes kept after region filtering, in execution order */
  records: MemoryWriteEvent[]
  /** Lines matching the memory-write grammar before region filtering */
  matchedLines: number
  region?: AddressRegion
  outputPath: string
}
