import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { createEnvSchema, loadRvgoldEnv } from '../src/env'
import { z, zAddress } from '../src/zod'

// Points dotenv at a file that does not exist so only `source` is read
const NO_ENV_FILE = '/nonexistent/.env'

describe('loadRvgoldEnv', () => {
  it('should apply build layout defaults', () => {
    const env = loadRvgoldEnv(NO_ENV_FILE, {})

    expect(env).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      RVGOLD_BUILD_DIR: 'build',
      RVGOLD_LOG_DIR: 'log',
      RVGOLD_XLEN: 64,
      SPIKE: 'spike',
    })
  })

  it('should read overrides', () => {
    const env = loadRvgoldEnv(NO_ENV_FILE, {
      RVGOLD_BUILD_DIR: 'out',
      RVGOLD_XLEN: '32',
      SPIKE: '/opt/riscv/bin/spike',
      LOG_LEVEL: 'debug',
    })

    expect(env.RVGOLD_BUILD_DIR).toBe('out')
    expect(env.RVGOLD_XLEN).toBe(32)
    expect(env.SPIKE).toBe('/opt/riscv/bin/spike')
    expect(env.LOG_LEVEL).toBe('debug')
  })

  it('should reject an unsupported register width', () => {
    expect(() => loadRvgoldEnv(NO_ENV_FILE, { RVGOLD_XLEN: '128' })).toThrow(
      ZodError,
    )
  })

  it('should reject an unknown log level', () => {
    expect(() => loadRvgoldEnv(NO_ENV_FILE, { LOG_LEVEL: 'bogus' })).toThrow(
      ZodError,
    )
  })
})

describe('createEnvSchema', () => {
  it('should extend the base schema', () => {
    const schema = createEnvSchema({ EXTRA: z.string().default('x') })

    expect(schema.parse({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      EXTRA: 'x',
    })
  })
})

describe('zAddress', () => {
  it('should accept bigints and hex strings', () => {
    expect(zAddress.parse(16n)).toBe(16n)
    expect(zAddress.parse('0x10')).toBe(16n)
    expect(zAddress.parse('ff')).toBe(255n)
    expect(zAddress.safeParse('0xg').success).toBe(false)
  })
})
