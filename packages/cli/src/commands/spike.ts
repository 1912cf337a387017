import { join } from 'node:path'
import { logger, type RvgoldEnv } from '@rvgold/core'
import {
  createSpikeConfig,
  DEFAULT_ISA,
  runSpike,
  type SpikeError,
  type SpikeExecutor,
  spawnExecutor,
} from '@rvgold/spike'
import type {
  ExitCode,
  Safe,
  SpikeConfig,
  SpikeOptions,
  SpikeRunResult,
} from '@rvgold/types'
import { EXIT_CODES } from '@rvgold/types'
import { Command } from 'commander'
import { ensureOutputDir } from '../utils/build-dir'
import { failWith } from '../utils/exit'
import { TRACE_FILENAME } from './extract'

export function resolveSpikeConfig(
  elfPath: string,
  options: SpikeOptions,
  env: RvgoldEnv,
): Safe<SpikeConfig, SpikeError> {
  return createSpikeConfig({
    spike: options.spike ?? env.SPIKE,
    elfPath,
    tracePath: options.trace ?? join(env.RVGOLD_BUILD_DIR, TRACE_FILENAME),
    isa: options.isa,
    pc: options.pc,
    memoryBase: options.memBase,
    memorySize: options.memSize,
    debug: options.debug ?? false,
  })
}

/**
 * Run the simulator; resolves with the result, or the exit status on failure
 */
export async function executeSpike(
  elfPath: string,
  options: SpikeOptions,
  env: RvgoldEnv,
  executor: SpikeExecutor = spawnExecutor,
): Promise<SpikeRunResult | ExitCode> {
  const [configError, config] = resolveSpikeConfig(elfPath, options, env)
  if (configError) {
    return failWith('Simulation', configError)
  }

  if (!options.trace && !config.debug) {
    const [dirError] = ensureOutputDir(env.RVGOLD_BUILD_DIR)
    if (dirError) {
      return failWith('Simulation', dirError)
    }
  }

  logger.info('Running reference ISA simulator...')
  const [error, result] = await runSpike(config, executor)
  if (error) {
    return failWith('Simulation', error)
  }
  return result
}

export function addSpikeOptions(command: Command): Command {
  return command
    .option('--spike <bin>', 'Simulator executable (default: $SPIKE or "spike")')
    .option('-t, --trace <path>', 'Commit-log trace (default: <build>/spike)')
    .option('--isa <isa>', `ISA string passed to the simulator (default: "${DEFAULT_ISA}")`)
    .option('--pc <addr>', 'Reset PC, hex', '0x40000000')
    .option('--mem-base <addr>', 'Memory base address, hex', '0x40000000')
    .option('--mem-size <size>', 'Memory size in bytes, hex', '0x8000000')
}

export function createSpikeCommand(
  env: RvgoldEnv,
  executor: SpikeExecutor = spawnExecutor,
): Command {
  const command = new Command('spike')
    .description('Run the reference ISA simulator with commit logging')
    .argument('<elf>', 'Program linked for the simulator memory map')
    .option('-d, --debug', 'Start the interactive simulator debugger, no trace')

  return addSpikeOptions(command).action(
    async (elfPath: string, options: SpikeOptions) => {
      const outcome = await executeSpike(elfPath, options, env, executor)
      process.exitCode =
        typeof outcome === 'number' ? outcome : EXIT_CODES.SUCCESS
    },
  )
}
