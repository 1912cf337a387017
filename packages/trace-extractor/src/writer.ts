import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { logger } from '@rvgold/core'
import type { Safe } from '@rvgold/types'
import { safeError, safeResult, safeTrySync } from '@rvgold/types'
import { WriteError } from './errors'

/**
 * Write the artifact through a temporary sibling and rename it into place,
 * so the output path only ever holds a complete artifact
 */
export function writeExpectedData(
  outputPath: string,
  contents: string,
): Safe<string, WriteError> {
  const tempPath = `${outputPath}.${process.pid}.tmp`

  const [error] = safeTrySync(() => {
    mkdirSync(dirname(outputPath), { recursive: true })
    writeFileSync(tempPath, contents, 'utf-8')
    renameSync(tempPath, outputPath)
  })

  if (error) {
    const [cleanupError] = safeTrySync(() => rmSync(tempPath, { force: true }))
    if (cleanupError) {
      logger.warn(`Could not remove temporary file ${tempPath}`, {
        error: cleanupError.message,
      })
    }
    return safeError(
      new WriteError(
        `Failed to write expected data to ${outputPath}: ${error.message}`,
        outputPath,
      ),
    )
  }

  logger.debug(`Wrote expected data to ${outputPath}`)
  return safeResult(outputPath)
}

/**
 * Remove an artifact left by a previous run so a failed run leaves no output
 */
export function discardExpectedData(outputPath: string): Safe<void, WriteError> {
  const [error] = safeTrySync(() => rmSync(outputPath, { force: true }))
  if (error) {
    return safeError(
      new WriteError(
        `Failed to remove stale expected data ${outputPath}: ${error.message}`,
        outputPath,
      ),
    )
  }
  return safeResult(undefined)
}
