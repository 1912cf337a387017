/**
 * CLI Types
 *
 * Types for command-line interface operations
 */

import type { ExpectedDataFormat } from './trace'

export interface GlobalOptions {
  logLevel?: string
  verbose?: boolean
}

export interface ExtractOptions extends GlobalOptions {
  trace?: string
  output?: string
  xlen?: string
  region?: string
  symbols?: string
  beginSymbol?: string
  endSymbol?: string
  format?: ExpectedDataFormat
}

export interface SpikeOptions extends GlobalOptions {
  spike?: string
  trace?: string
  isa?: string
  pc?: string
  memBase?: string
  memSize?: string
  debug?: boolean
}

export interface CleanOptions extends GlobalOptions {
  full?: boolean
}
