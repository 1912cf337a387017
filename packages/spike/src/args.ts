import type { SpikeConfig, Xlen } from '@rvgold/types'

/**
 * Command line for a commit-logging run:
 *   spike -l --log-commits [-d] --isa=rv64g --pc=0x40000000 -m0x40000000:0x8000000 prog.elf
 */
export function buildSpikeArgs(
  config: Pick<
    SpikeConfig,
    'elfPath' | 'isa' | 'pc' | 'memoryBase' | 'memorySize' | 'debug'
  >,
): string[] {
  return [
    '-l',
    '--log-commits',
    ...(config.debug ? ['-d'] : []),
    `--isa=${config.isa}`,
    `--pc=0x${config.pc.toString(16)}`,
    `-m0x${config.memoryBase.toString(16)}:0x${config.memorySize.toString(16)}`,
    config.elfPath,
  ]
}

/**
 * Register width named by an ISA string (`rv32imac` -> 32)
 */
export function xlenFromIsa(isa: string): Xlen | undefined {
  const match = isa.toLowerCase().match(/^rv(32|64)/)
  if (!match) return undefined
  return match[1] === '32' ? 32 : 64
}
