/**
 * Unit tests for hex utilities
 */

import { describe, expect, it } from 'vitest'
import {
  formatHex,
  hexWidth,
  isHexDigits,
  isValidHexNumber,
  padHex,
  parseHexBigInt,
  stripHexPrefix,
} from '../../src/utils/hex'

describe('hex utilities', () => {
  it('should strip an optional prefix', () => {
    expect(stripHexPrefix('0x55')).toBe('55')
    expect(stripHexPrefix('0XAB')).toBe('AB')
    expect(stripHexPrefix('55')).toBe('55')
  })

  it('should recognise hex digits', () => {
    expect(isHexDigits('0123456789abcdefABCDEF')).toBe(true)
    expect(isHexDigits('')).toBe(false)
    expect(isHexDigits('0x55')).toBe(false)
    expect(isHexDigits('5g')).toBe(false)
  })

  it('should validate hex numbers of any length', () => {
    expect(isValidHexNumber('0x1')).toBe(true)
    expect(isValidHexNumber('abc')).toBe(true)
    expect(isValidHexNumber('0x')).toBe(false)
    expect(isValidHexNumber('')).toBe(false)
  })

  it('should parse hex into bigint', () => {
    expect(parseHexBigInt('0x40001000')).toBe(0x40001000n)
    expect(parseHexBigInt('ffffffffffffffff')).toBe(0xffffffffffffffffn)
    expect(() => parseHexBigInt('0xzz')).toThrow(SyntaxError)
  })

  it('should compute digit widths for register sizes', () => {
    expect(hexWidth(32)).toBe(8)
    expect(hexWidth(64)).toBe(16)
  })

  it('should pad and lower-case digits', () => {
    expect(padHex('1', 16)).toBe('0000000000000001')
    expect(padHex('DEADBEEF', 8)).toBe('deadbeef')
    expect(formatHex(0x40001000n, 16)).toBe('0000000040001000')
  })
})
