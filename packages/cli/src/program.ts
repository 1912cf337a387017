import { logger, logLevelSchema, type RvgoldEnv } from '@rvgold/core'
import { type SpikeExecutor, spawnExecutor } from '@rvgold/spike'
import type { GlobalOptions } from '@rvgold/types'
import { EXIT_CODES } from '@rvgold/types'
import { Command } from 'commander'
import { createCleanCommand } from './commands/clean'
import { createExtractCommand } from './commands/extract'
import { createSpikeCommand } from './commands/spike'
import { createTestCommand } from './commands/test'

export const VERSION = '0.1.0'

export function createProgram(
  env: RvgoldEnv,
  executor: SpikeExecutor = spawnExecutor,
): Command {
  const program = new Command('rvgold')
    .description(
      'Golden expected-memory data for RISC-V instruction tests, from reference simulator traces',
    )
    .version(VERSION)
    .option('-v, --verbose', 'Log debug output')
    .option('--log-level <level>', 'Log level (default: $LOG_LEVEL or "info")')
    .hook('preAction', (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts()
      if (options.verbose) {
        logger.init('debug')
        return
      }
      if (options.logLevel === undefined) {
        return
      }
      const level = logLevelSchema.safeParse(options.logLevel)
      if (!level.success) {
        return thisCommand.error(
          `error: invalid log level "${options.logLevel}", expected one of ${logLevelSchema.options.join(', ')}`,
          {
            exitCode: EXIT_CODES.INVALID_CONFIG,
            code: 'rvgold.invalidLogLevel',
          },
        )
      }
      logger.init(level.data)
    })

  program.addCommand(createExtractCommand(env))
  program.addCommand(createSpikeCommand(env, executor))
  program.addCommand(createTestCommand(env, executor))
  program.addCommand(createCleanCommand(env))

  return program
}
