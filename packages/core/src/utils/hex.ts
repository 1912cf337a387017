/**
 * Hex Utilities
 *
 * Helpers for the hexadecimal tokens found in simulator traces and symbol tables
 */

const HEX_DIGITS = /^[0-9a-fA-F]+$/

/**
 * Remove a leading `0x` / `0X` if present
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex
}

/**
 * True when the string is one or more hex digits, without prefix
 */
export function isHexDigits(value: string): boolean {
  return HEX_DIGITS.test(value)
}

/**
 * Validates if a string is a valid hex number (with or without 0x prefix)
 * Unlike byte strings, odd lengths are accepted
 */
export function isValidHexNumber(hex: string): boolean {
  if (!hex || typeof hex !== 'string') {
    return false
  }
  return isHexDigits(stripHexPrefix(hex))
}

/**
 * Parse a hex string (with or without 0x prefix) into a bigint
 * @throws SyntaxError when the string is not a hex number
 */
export function parseHexBigInt(hex: string): bigint {
  const digits = stripHexPrefix(hex)
  if (!isHexDigits(digits)) {
    throw new SyntaxError(`Invalid hex number: ${hex}`)
  }
  return BigInt(`0x${digits}`)
}

/**
 * Number of hex digits in a register of the given width
 */
export function hexWidth(bits: number): number {
  return Math.ceil(bits / 4)
}

/**
 * Lower-case and left zero-pad hex digits to a fixed width
 * Longer input is returned unchanged; callers check the width first
 */
export function padHex(digits: string, width: number): string {
  return digits.toLowerCase().padStart(width, '0')
}

/**
 * Format a bigint as fixed-width lower-case hex without prefix
 */
export function formatHex(value: bigint, width: number): string {
  return value.toString(16).padStart(width, '0')
}
