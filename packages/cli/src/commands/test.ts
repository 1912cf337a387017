import { logger, type RvgoldEnv } from '@rvgold/core'
import {
  type SpikeExecutor,
  spawnExecutor,
  xlenFromIsa,
} from '@rvgold/spike'
import type {
  ExitCode,
  ExtractOptions,
  GlobalOptions,
  SpikeOptions,
} from '@rvgold/types'
import { EXIT_CODES } from '@rvgold/types'
import { Command } from 'commander'
import { ensureOutputDir } from '../utils/build-dir'
import { failWith } from '../utils/exit'
import { addExtractOptions, executeExtract } from './extract'
import { addSpikeOptions, executeSpike } from './spike'

type TestOptions = GlobalOptions &
  Omit<SpikeOptions, 'debug'> &
  Omit<ExtractOptions, 'trace'>

/**
 * Simulate, then extract the expected data from the fresh trace
 */
export async function executeTest(
  elfPath: string,
  options: TestOptions,
  env: RvgoldEnv,
  executor: SpikeExecutor = spawnExecutor,
): Promise<ExitCode> {
  for (const dir of [env.RVGOLD_BUILD_DIR, env.RVGOLD_LOG_DIR]) {
    const [dirError] = ensureOutputDir(dir)
    if (dirError) {
      return failWith('Test', dirError)
    }
  }

  logger.info(`==> Building reference data for ${elfPath}`)

  const outcome = await executeSpike(
    elfPath,
    { ...options, debug: false },
    env,
    executor,
  )
  if (typeof outcome === 'number') {
    return outcome
  }

  const xlen =
    options.xlen ?? (options.isa ? xlenFromIsa(options.isa)?.toString() : undefined)

  const exitCode = executeExtract(
    { ...options, trace: outcome.tracePath, xlen },
    env,
  )
  if (exitCode === EXIT_CODES.SUCCESS) {
    logger.info('Test completed successfully')
  }
  return exitCode
}

export function createTestCommand(
  env: RvgoldEnv,
  executor: SpikeExecutor = spawnExecutor,
): Command {
  const command = new Command('test')
    .description('Run the reference simulator, then extract the expected data')
    .argument('<elf>', 'Program linked for the simulator memory map')

  return addExtractOptions(addSpikeOptions(command)).action(
    async (elfPath: string, options: TestOptions) => {
      process.exitCode = await executeTest(elfPath, options, env, executor)
    },
  )
}
