import {
  existsSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { SpikeConfig } from '@rvgold/types'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { buildSpikeArgs, xlenFromIsa } from '../args'
import { createSpikeConfig } from '../config'
import { SpikeError } from '../errors'
import { runSpike, type SpikeExecutor } from '../runner'

describe('buildSpikeArgs', () => {
  const base = {
    elfPath: 'build/spike.elf',
    isa: 'rv64g',
    pc: 0x40000000n,
    memoryBase: 0x40000000n,
    memorySize: 0x8000000n,
    debug: false,
  }

  it('should build a commit-logging command line', () => {
    expect(buildSpikeArgs(base)).toEqual([
      '-l',
      '--log-commits',
      '--isa=rv64g',
      '--pc=0x40000000',
      '-m0x40000000:0x8000000',
      'build/spike.elf',
    ])
  })

  it('should add the debugger flag in debug mode', () => {
    expect(buildSpikeArgs({ ...base, debug: true }).slice(0, 4)).toEqual([
      '-l',
      '--log-commits',
      '-d',
      '--isa=rv64g',
    ])
  })
})

describe('xlenFromIsa', () => {
  it('should read the register width from the ISA string', () => {
    expect(xlenFromIsa('rv64g')).toBe(64)
    expect(xlenFromIsa('RV32IMAC')).toBe(32)
    expect(xlenFromIsa('arm')).toBeUndefined()
  })
})

describe('createSpikeConfig', () => {
  it('should fill in the default memory layout', () => {
    const [error, config] = createSpikeConfig({
      elfPath: 'build/spike.elf',
      tracePath: 'build/spike',
    })

    expect(error).toBeUndefined()
    expect(config).toEqual({
      spike: 'spike',
      elfPath: 'build/spike.elf',
      tracePath: 'build/spike',
      isa: 'rv64g',
      pc: 0x40000000n,
      memoryBase: 0x40000000n,
      memorySize: 0x8000000n,
      debug: false,
    })
  })

  it('should parse hex addresses', () => {
    const [, config] = createSpikeConfig({
      elfPath: 'prog.elf',
      tracePath: 'trace',
      isa: 'rv32imac',
      pc: '0x80000000',
      memoryBase: '80000000',
      memorySize: '0x10000',
    })

    expect(config?.pc).toBe(0x80000000n)
    expect(config?.memoryBase).toBe(0x80000000n)
    expect(config?.memorySize).toBe(0x10000n)
  })

  it('should reject an unknown ISA and an empty memory', () => {
    const [error] = createSpikeConfig({
      elfPath: 'prog.elf',
      tracePath: 'trace',
      isa: 'x86',
      memorySize: 0n,
    })

    expect(error).toBeInstanceOf(SpikeError)
    expect(error?.code).toBe('INVALID_CONFIG')
    expect(error?.message).toBe(
      'Invalid simulator configuration: isa: ISA must look like rv64g or rv32imac; memorySize: Memory size must be positive',
    )
  })
})

describe('runSpike', () => {
  let dir: string
  let config: SpikeConfig

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rvgold-spike-'))
    const elfPath = join(dir, 'spike.elf')
    writeFileSync(elfPath, 'ELF')
    config = {
      spike: 'spike',
      elfPath,
      tracePath: join(dir, 'build', 'spike'),
      isa: 'rv64g',
      pc: 0x40000000n,
      memoryBase: 0x40000000n,
      memorySize: 0x8000000n,
      debug: false,
    }
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should capture simulator output into the trace file', async () => {
    const executor = vi.fn<SpikeExecutor>(async (_command, _args, trace) => {
      trace?.write('core   0: 3 0x0000000040000000 (0x00b53023) mem 0x0000000040001000 0x0000000000000055\n')
      return 0
    })

    const [error, result] = await runSpike(config, executor)

    expect(error).toBeUndefined()
    expect(result).toEqual({ exitCode: 0, tracePath: config.tracePath })
    expect(executor).toHaveBeenCalledWith(
      'spike',
      buildSpikeArgs(config),
      expect.anything(),
    )
    expect(readFileSync(config.tracePath, 'utf-8')).toBe(
      'core   0: 3 0x0000000040000000 (0x00b53023) mem 0x0000000040001000 0x0000000000000055\n',
    )
  })

  it('should report a non-zero exit status without failing', async () => {
    const [error, result] = await runSpike(config, async () => 3)

    expect(error).toBeUndefined()
    expect(result?.exitCode).toBe(3)
  })

  it('should run without a trace in debug mode', async () => {
    const executor = vi.fn<SpikeExecutor>(async () => 0)

    const [, result] = await runSpike({ ...config, debug: true }, executor)

    expect(result).toEqual({ exitCode: 0 })
    expect(executor.mock.calls[0]?.[2]).toBeUndefined()
    expect(existsSync(config.tracePath)).toBe(false)
  })

  it('should fail when the ELF is missing', async () => {
    const executor = vi.fn<SpikeExecutor>(async () => 0)

    const [error] = await runSpike(
      { ...config, elfPath: join(dir, 'absent.elf') },
      executor,
    )

    expect(error?.code).toBe('MISSING_INPUT')
    expect(executor).not.toHaveBeenCalled()
  })

  it('should fail when the trace directory cannot be created', async () => {
    writeFileSync(join(dir, 'build'), 'not a directory')
    const executor = vi.fn<SpikeExecutor>(async () => 0)

    const [error] = await runSpike(config, executor)

    expect(error).toBeInstanceOf(SpikeError)
    expect(error?.code).toBe('WRITE_FAILED')
    expect(error?.message.startsWith(`Failed to write trace ${config.tracePath}: `)).toBe(true)
    expect(executor).not.toHaveBeenCalled()
  })

  it('should fail when the simulator cannot be started', async () => {
    const [error] = await runSpike(config, async () => {
      throw new Error('spawn spike ENOENT')
    })

    expect(error).toBeInstanceOf(SpikeError)
    expect(error?.code).toBe('SPIKE_FAILED')
    expect(error?.message).toBe(
      'Failed to run reference simulator spike: spawn spike ENOENT',
    )
  })
})
