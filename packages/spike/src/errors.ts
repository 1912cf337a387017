import { type ErrorCode, SPIKE_ERRORS } from '@rvgold/types'

export class SpikeError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = SPIKE_ERRORS.SPIKE_FAILED,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'SpikeError'
  }
}
