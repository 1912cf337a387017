import { existsSync, readFileSync } from 'node:fs'
import { logger } from '@rvgold/core'
import type { ExtractionResult, ExtractorConfig, Safe } from '@rvgold/types'
import { safeError, safeResult, safeTrySync } from '@rvgold/types'
import { parseCommitLog } from './commit-log'
import { MissingInputError, type TraceExtractError } from './errors'
import { formatExpectedData } from './format'
import { filterToRegion } from './region'
import { resolveRegion } from './symbols'
import { discardExpectedData, writeExpectedData } from './writer'

/**
 * Derive the expected data set from a commit-log trace and persist it
 *
 * The trace is parsed completely before anything is written. When the run
 * fails, any artifact from a previous run is removed, so the output path
 * holds either the complete result of this run or nothing.
 *
 * A trace without writes in the region is not an error: the artifact is
 * empty and the status is `no-writes`.
 */
export function extractExpectedData(
  config: ExtractorConfig,
): Safe<ExtractionResult, TraceExtractError> {
  const [error, result] = runExtraction(config)
  if (error) {
    const [discardError] = discardExpectedData(config.outputPath)
    if (discardError) {
      logger.warn(discardError.message)
    }
    return safeError(error)
  }
  return safeResult(result)
}

function runExtraction(
  config: ExtractorConfig,
): Safe<ExtractionResult, TraceExtractError> {
  const { tracePath, outputPath, xlen, format } = config

  if (!existsSync(tracePath)) {
    return safeError(
      new MissingInputError(
        `Trace file not found: ${tracePath} (the reference simulator must run before extraction)`,
        tracePath,
      ),
    )
  }

  const [readError, text] = safeTrySync(() => readFileSync(tracePath, 'utf-8'))
  if (readError) {
    return safeError(
      new MissingInputError(
        `Failed to read trace file ${tracePath}: ${readError.message}`,
        tracePath,
      ),
    )
  }

  const [parseError, events] = parseCommitLog(text, xlen)
  if (parseError) {
    return safeError(parseError)
  }

  const [regionError, region] = resolveRegion(config)
  if (regionError) {
    return safeError(regionError)
  }

  const records = filterToRegion(events, region)
  const contents = formatExpectedData(records, format, xlen)

  const [writeError] = writeExpectedData(outputPath, contents)
  if (writeError) {
    return safeError(writeError)
  }

  const status = records.length === 0 ? 'no-writes' : 'ok'
  if (status === 'no-writes') {
    logger.warn('No memory writes observed in trace', {
      tracePath,
      matchedLines: events.length,
      outputPath,
    })
  } else {
    logger.info(`Extracted ${records.length} expected value(s)`, {
      tracePath,
      matchedLines: events.length,
      outputPath,
    })
  }

  return safeResult({
    status,
    records,
    matchedLines: events.length,
    region,
    outputPath,
  })
}
