import { logger, type RvgoldEnv } from '@rvgold/core'
import type { CleanOptions, ExitCode } from '@rvgold/types'
import { EXIT_CODES } from '@rvgold/types'
import { Command } from 'commander'
import { removeOutputDir } from '../utils/build-dir'
import { failWith } from '../utils/exit'

export function executeClean(options: CleanOptions, env: RvgoldEnv): ExitCode {
  const dirs = options.full
    ? [env.RVGOLD_BUILD_DIR, env.RVGOLD_LOG_DIR]
    : [env.RVGOLD_BUILD_DIR]

  for (const dir of dirs) {
    logger.info(`Cleaning ${dir}...`)
    const [error, removed] = removeOutputDir(dir)
    if (error) {
      return failWith('Clean', error)
    }
    if (removed) {
      logger.info(`${dir} cleaned`)
    } else {
      logger.debug(`${dir} does not exist`)
    }
  }

  return EXIT_CODES.SUCCESS
}

export function createCleanCommand(env: RvgoldEnv): Command {
  return new Command('clean')
    .description('Remove the build directory')
    .option('--full', 'Also remove the log directory')
    .action((options: CleanOptions) => {
      process.exitCode = executeClean(options, env)
    })
}
