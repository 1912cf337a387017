import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { WriteError } from '@rvgold/trace-extractor'
import type { Safe } from '@rvgold/types'
import { safeError, safeResult, safeTrySync } from '@rvgold/types'

/**
 * Create a generated-output directory that ignores its own contents in git
 */
export function ensureOutputDir(dir: string): Safe<string, WriteError> {
  const [error] = safeTrySync(() => {
    mkdirSync(dir, { recursive: true })
    const gitignore = join(dir, '.gitignore')
    if (!existsSync(gitignore)) {
      writeFileSync(gitignore, '*\n')
    }
  })
  if (error) {
    return safeError(
      new WriteError(`Cannot create directory ${dir}: ${error.message}`, dir),
    )
  }
  return safeResult(dir)
}

/**
 * Remove a generated-output directory
 * @returns false when there was nothing to remove
 */
export function removeOutputDir(dir: string): Safe<boolean, WriteError> {
  if (!existsSync(dir)) {
    return safeResult(false)
  }
  const [error] = safeTrySync(() => rmSync(dir, { recursive: true, force: true }))
  if (error) {
    return safeError(
      new WriteError(`Cannot remove directory ${dir}: ${error.message}`, dir),
    )
  }
  return safeResult(true)
}
