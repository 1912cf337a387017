import { join } from 'node:path'
import { logger, type RvgoldEnv, xlenSchema } from '@rvgold/core'
import {
  ConfigError,
  createExtractorConfig,
  extractExpectedData,
  parseRegion,
} from '@rvgold/trace-extractor'
import type {
  AddressRegion,
  ExitCode,
  ExtractOptions,
  ExtractorConfig,
  Safe,
} from '@rvgold/types'
import { EXIT_CODES, safeError } from '@rvgold/types'
import { Command, Option } from 'commander'
import { ensureOutputDir } from '../utils/build-dir'
import { failWith } from '../utils/exit'

export const TRACE_FILENAME = 'spike'
export const TEST_DATA_FILENAME = 'test_data'

/**
 * Merge command line options over the environment defaults
 */
export function resolveExtractConfig(
  options: ExtractOptions,
  env: RvgoldEnv,
): Safe<ExtractorConfig, ConfigError> {
  let region: AddressRegion | undefined
  if (options.region) {
    const [regionError, parsed] = parseRegion(options.region)
    if (regionError) {
      return safeError(regionError)
    }
    region = parsed
  }

  let xlen = env.RVGOLD_XLEN
  if (options.xlen !== undefined) {
    const parsed = xlenSchema.safeParse(options.xlen)
    if (!parsed.success) {
      return safeError(
        new ConfigError(`XLEN must be 32 or 64, got "${options.xlen}"`),
      )
    }
    xlen = parsed.data
  }

  return createExtractorConfig({
    tracePath: options.trace ?? join(env.RVGOLD_BUILD_DIR, TRACE_FILENAME),
    outputPath:
      options.output ?? join(env.RVGOLD_BUILD_DIR, TEST_DATA_FILENAME),
    xlen,
    format: options.format,
    region,
    symbolFile: options.symbols,
    beginSymbol: options.beginSymbol,
    endSymbol: options.endSymbol,
  })
}

export function executeExtract(
  options: ExtractOptions,
  env: RvgoldEnv,
): ExitCode {
  const [configError, config] = resolveExtractConfig(options, env)
  if (configError) {
    return failWith('Extraction', configError)
  }

  logger.info('Extracting test data...')
  if (!options.output) {
    const [dirError] = ensureOutputDir(env.RVGOLD_BUILD_DIR)
    if (dirError) {
      return failWith('Extraction', dirError)
    }
  }

  const [error, result] = extractExpectedData(config)
  if (error) {
    return failWith('Extraction', error)
  }

  logger.info(
    result.status === 'no-writes'
      ? `No writes observed; wrote empty ${result.outputPath}`
      : `Wrote ${result.records.length} record(s) to ${result.outputPath}`,
  )
  return EXIT_CODES.SUCCESS
}

export function addExtractOptions(command: Command): Command {
  return command
    .option('-o, --output <path>', 'Expected data file (default: <build>/test_data)')
    .option('-x, --xlen <bits>', 'Target register width, 32 or 64')
    .option('--region <start:end>', 'Keep writes in [start, end), hex bounds')
    .option('--symbols <path>', 'nm symbol table used to resolve the region')
    .option('--begin-symbol <name>', 'Symbol starting the region', 'begin_signature')
    .option('--end-symbol <name>', 'Symbol ending the region', 'end_signature')
    .addOption(
      new Option('--format <format>', 'Record layout')
        .choices(['flat', 'annotated'])
        .default('flat'),
    )
}

export function createExtractCommand(env: RvgoldEnv): Command {
  const command = new Command('extract')
    .description(
      'Extract expected memory writes from a reference simulator commit log',
    )
    .option('-t, --trace <path>', 'Commit-log trace (default: <build>/spike)')

  return addExtractOptions(command).action((options: ExtractOptions) => {
    process.exitCode = executeExtract(options, env)
  })
}
