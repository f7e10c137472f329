export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: item names, source names,
 * offending values. Carried as data so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if running the same operation again, unchanged, might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected failures caused by input (a bad value in a config file,
   * a missing required setting); `false` for programmer errors and broken
   * invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs and process output.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
