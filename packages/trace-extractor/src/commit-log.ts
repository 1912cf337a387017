/**
 * Commit Log Parser
 *
 * Scrapes memory writes out of the reference simulator's commit log
 * (`spike -l --log-commits`). A store commits as:
 *
 *   core   0: 3 0x0000000040000010 (0x00a12023) mem 0x0000000040001000 0x00000055
 *
 * Loads log a register write between the instruction word and `mem`, so only
 * lines where `mem` directly follows the closing parenthesis are writes.
 */

import { hexWidth, isHexDigits, padHex, stripHexPrefix } from '@rvgold/core'
import type { MemoryWriteEvent, Safe, Xlen } from '@rvgold/types'
import { safeError, safeErrorStr, safeResult } from '@rvgold/types'
import { ParseError } from './errors'

export const MEMORY_WRITE_MARKER = ') mem 0x'

const MEM_KEYWORD = 'mem'

/**
 * Normalize a value token to `width` lower-case digits
 * Returns a reason string when the token is not a usable value
 */
function normalizeValue(token: string, width: number): Safe<string, string> {
  const digits = stripHexPrefix(token)
  if (!isHexDigits(digits)) {
    return safeErrorStr(`Malformed write value "${token}"`)
  }

  // Over-long tokens are accepted only when the excess is leading zeros
  const significant =
    digits.length > width ? digits.replace(/^0+(?=.)/, '') : digits
  if (significant.length > width) {
    return safeErrorStr(
      `Write value "${token}" is wider than ${width * 4} bits`,
    )
  }

  return safeResult(padHex(significant, width))
}

/**
 * Parse one trace line
 * @param line - Raw trace line
 * @param lineNumber - 1-based line number, reported in errors
 * @param xlen - Target register width, fixes the output width
 * @returns `undefined` for lines that are not memory writes
 */
export function parseCommitLine(
  line: string,
  lineNumber: number,
  xlen: Xlen,
): Safe<MemoryWriteEvent | undefined, ParseError> {
  const markerIndex = line.indexOf(MEMORY_WRITE_MARKER)
  if (markerIndex === -1) {
    return safeResult(undefined)
  }

  // tokens[0] is `mem`
  const tokens = line
    .slice(markerIndex + 2)
    .trim()
    .split(/\s+/)

  const width = hexWidth(xlen)
  let write: { address: bigint; value: string } | undefined

  for (let i = 0; i < tokens.length; i++) {
    if (tokens[i] !== MEM_KEYWORD) continue

    const addressToken = tokens[i + 1]
    const valueToken = tokens[i + 2]
    if (addressToken === undefined) {
      return safeError(new ParseError('Missing write address', lineNumber, line))
    }

    const addressDigits = stripHexPrefix(addressToken)
    if (!isHexDigits(addressDigits)) {
      return safeError(
        new ParseError(
          `Malformed write address "${addressToken}"`,
          lineNumber,
          line,
        ),
      )
    }

    // AMOs log the load address as a bare `mem <addr>` before the store pair
    if (valueToken === undefined || valueToken === MEM_KEYWORD) {
      i += 1
      continue
    }

    const [reason, value] = normalizeValue(valueToken, width)
    if (reason !== undefined) {
      return safeError(new ParseError(reason, lineNumber, line))
    }

    write = { address: BigInt(`0x${addressDigits}`), value }
    i += 2
  }

  if (!write) {
    return safeError(new ParseError('Missing write value', lineNumber, line))
  }

  return safeResult({
    lineNumber,
    address: write.address,
    value: write.value,
    raw: line,
  })
}

/**
 * Filter-map-collect over a whole trace, stopping at the first malformed write
 */
export function parseCommitLog(
  text: string,
  xlen: Xlen,
): Safe<MemoryWriteEvent[], ParseError> {
  const events: MemoryWriteEvent[] = []
  const lines = text.split(/\r?\n/)

  for (const [index, line] of lines.entries()) {
    const [error, event] = parseCommitLine(line, index + 1, xlen)
    if (error) {
      return safeError(error)
    }
    if (event) {
      events.push(event)
    }
  }

  return safeResult(events)
}
