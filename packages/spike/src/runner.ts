import { spawn } from 'node:child_process'
import { createWriteStream, existsSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import { logger } from '@rvgold/core'
import type { SafePromise, SpikeConfig, SpikeRunResult } from '@rvgold/types'
import {
  EXTRACT_ERRORS,
  safeError,
  safeResult,
  safeTry,
  safeTrySync,
} from '@rvgold/types'
import { buildSpikeArgs } from './args'
import { SpikeError } from './errors'

/**
 * Runs the simulator and resolves with its exit status
 * With a trace stream, stdout and stderr are both captured into it (the
 * commit log goes to stderr); without one the run is interactive.
 */
export type SpikeExecutor = (
  command: string,
  args: string[],
  trace?: Writable,
) => Promise<number>

export const spawnExecutor: SpikeExecutor = (command, args, trace) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: process.cwd(),
      stdio: trace ? ['ignore', 'pipe', 'pipe'] : 'inherit',
    })

    // The caller ends the trace once both pipes have drained into it
    if (trace) {
      proc.stdout?.pipe(trace, { end: false })
      proc.stderr?.pipe(trace, { end: false })
    }

    proc.on('error', reject)
    proc.on('close', (code) => {
      resolve(code ?? 1)
    })
  })

/**
 * Run the reference simulator with commit logging and capture the trace
 *
 * A non-zero exit status is reported, not treated as an error: tests signal
 * failure through `tohost` and their trace is still worth extracting.
 */
export async function runSpike(
  config: SpikeConfig,
  executor: SpikeExecutor = spawnExecutor,
): SafePromise<SpikeRunResult, SpikeError> {
  if (!existsSync(config.elfPath)) {
    return safeError(
      new SpikeError(
        `ELF file not found: ${config.elfPath}`,
        EXTRACT_ERRORS.MISSING_INPUT,
        { elfPath: config.elfPath },
      ),
    )
  }

  const args = buildSpikeArgs(config)
  logger.info(`Running ${config.spike} ${args.join(' ')}`)

  if (config.debug) {
    logger.info('Entering interactive simulator debugger')
    const [runError, exitCode] = await safeTry(executor(config.spike, args))
    if (runError) {
      return safeError(startFailure(config, runError))
    }
    return safeResult({ exitCode })
  }

  const [openError, trace] = safeTrySync(() => {
    mkdirSync(dirname(config.tracePath), { recursive: true })
    return createWriteStream(config.tracePath)
  })
  if (openError) {
    return safeError(traceFailure(config, openError))
  }
  // Subscribe before running so an open failure is observed
  const traceClosed = safeTry(finished(trace))

  const [runError, exitCode] = await safeTry(
    executor(config.spike, args, trace),
  )
  trace.end()
  const [closeError] = await traceClosed

  if (runError) {
    return safeError(startFailure(config, runError))
  }
  if (closeError) {
    return safeError(traceFailure(config, closeError))
  }

  if (exitCode !== 0) {
    logger.warn(`Reference simulator exited with status ${exitCode}`, {
      elfPath: config.elfPath,
    })
  }

  return safeResult({ exitCode, tracePath: config.tracePath })
}

function traceFailure(config: SpikeConfig, error: Error): SpikeError {
  return new SpikeError(
    `Failed to write trace ${config.tracePath}: ${error.message}`,
    EXTRACT_ERRORS.WRITE_FAILED,
    { tracePath: config.tracePath },
  )
}

function startFailure(config: SpikeConfig, error: Error): SpikeError {
  return new SpikeError(
    `Failed to run reference simulator ${config.spike}: ${error.message}`,
    undefined,
    { spike: config.spike },
  )
}
