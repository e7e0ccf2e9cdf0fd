/**
 * Error Types
 *
 * Fatal errors that abort a run. Cache misses and user cancellations are
 * not errors and never reach here.
 */

import type { ApiErrorType } from './types'

/**
 * Durable storage is unavailable or unwritable.
 */
export class CacheWriteError extends Error {
  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(
      `Failed to write cache record ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'CacheWriteError'
  }
}

/**
 * A document could not be read or is not in a supported format.
 */
export class ExtractionError extends Error {
  constructor(
    readonly path: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Could not extract text from ${path}: ${reason}`, cause === undefined ? {} : { cause })
    this.name = 'ExtractionError'
  }
}

/**
 * The generation service rejected the request or could not be reached.
 */
export class GenerationError extends Error {
  constructor(
    readonly type: ApiErrorType,
    message: string
  ) {
    super(message)
    this.name = 'GenerationError'
  }
}
