/**
 * Symbol Table
 *
 * Resolves the region of interest from `nm` output of the simulated ELF, e.g.
 *
 *   0000000040001000 D begin_signature
 *   0000000040001040 D end_signature
 *                    U undefined_symbol
 */

import { existsSync, readFileSync } from 'node:fs'
import { logger } from '@rvgold/core'
import type { AddressRegion, ExtractorConfig, Safe } from '@rvgold/types'
import { safeError, safeResult, safeTrySync } from '@rvgold/types'
import { ConfigError, MissingInputError } from './errors'
import { validateRegion } from './region'

const NM_LINE = /^([0-9a-fA-F]+)\s+(\S)\s+(\S+)\s*$/

/**
 * Parse `nm` output into name -> address
 * Undefined symbols (no address column) are skipped; the first definition wins
 */
export function parseSymbolTable(text: string): Map<string, bigint> {
  const symbols = new Map<string, bigint>()

  for (const line of text.split(/\r?\n/)) {
    const match = line.match(NM_LINE)
    if (!match) continue

    const [, address, , name] = match
    if (address === undefined || name === undefined) continue
    if (!symbols.has(name)) {
      symbols.set(name, BigInt(`0x${address}`))
    }
  }

  return symbols
}

/**
 * Region of interest for an extraction run
 * An explicit region wins over symbol lookup; neither means no filtering
 */
export function resolveRegion(
  config: Pick<
    ExtractorConfig,
    'region' | 'symbolFile' | 'beginSymbol' | 'endSymbol'
  >,
): Safe<AddressRegion | undefined, ConfigError | MissingInputError> {
  if (config.region) {
    return validateRegion(config.region)
  }

  if (!config.symbolFile) {
    return safeResult(undefined)
  }

  const symbolFile = config.symbolFile
  if (!existsSync(symbolFile)) {
    return safeError(
      new MissingInputError(`Symbol file not found: ${symbolFile}`, symbolFile),
    )
  }

  const [readError, text] = safeTrySync(() => readFileSync(symbolFile, 'utf-8'))
  if (readError) {
    return safeError(
      new MissingInputError(
        `Failed to read symbol file ${symbolFile}: ${readError.message}`,
        symbolFile,
      ),
    )
  }

  const symbols = parseSymbolTable(text)
  const start = symbols.get(config.beginSymbol)
  const end = symbols.get(config.endSymbol)

  if (start === undefined || end === undefined) {
    const missing = [
      start === undefined ? config.beginSymbol : undefined,
      end === undefined ? config.endSymbol : undefined,
    ].filter((name): name is string => name !== undefined)
    return safeError(
      new ConfigError(
        `Symbol(s) ${missing.join(', ')} not found in ${symbolFile}`,
        { symbolFile, missing },
      ),
    )
  }

  logger.debug('Resolved region from symbols', {
    begin: config.beginSymbol,
    end: config.endSymbol,
    start: `0x${start.toString(16)}`,
    stop: `0x${end.toString(16)}`,
  })

  return validateRegion({ start, end })
}
