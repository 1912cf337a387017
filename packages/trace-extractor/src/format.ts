import { formatHex, hexWidth } from '@rvgold/core'
import type { ExpectedDataFormat, MemoryWriteEvent, Xlen } from '@rvgold/types'

/**
 * Render the expected data set, one newline-terminated record per write
 * No writes renders as the empty string
 *
 * - `flat`:      `0000000000000055`
 * - `annotated`: `@0000000040001000 0000000000000055`
 */
export function formatExpectedData(
  events: MemoryWriteEvent[],
  format: ExpectedDataFormat,
  xlen: Xlen,
): string {
  const width = hexWidth(xlen)

  return events
    .map((event) =>
      format === 'annotated'
        ? `@${formatHex(event.address, width)} ${event.value}\n`
        : `${event.value}\n`,
    )
    .join('')
}
