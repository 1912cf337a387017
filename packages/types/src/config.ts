/**
 * Configuration Types
 *
 * Explicit configuration objects passed to the extractor and the simulator runner.
 */

import type { AddressRegion, ExpectedDataFormat, Xlen } from './trace'

export interface ExtractorConfig {
  /** Commit-log trace produced by the reference simulator */
  tracePath: string
  /** Expected-data artifact, overwritten on each run */
  outputPath: string
  xlen: Xlen
  format: ExpectedDataFormat
  /** Explicit region of interest; takes precedence over symbol lookup */
  region?: AddressRegion
  /** `nm` output used to resolve the region from symbols */
  symbolFile?: string
  beginSymbol: string
  endSymbol: string
}

export interface SpikeConfig {
  /** Simulator executable */
  spike: string
  elfPath: string
  /** Trace file receiving stdout and stderr of the run */
  tracePath: string
  isa: string
  pc: bigint
  memoryBase: bigint
  memorySize: bigint
  /** Interactive debugger; no trace is captured */
  debug: boolean
}

export interface SpikeRunResult {
  exitCode: number
  /** Undefined in debug mode */
  tracePath?: string
}
