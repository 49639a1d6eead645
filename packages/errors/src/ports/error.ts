export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, values, phase names...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface StructuredError extends Error {
  /** Stable, lower-case code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by input or environment (bad configuration,
   * a hook that timed out), `false` for programmer errors such as calling the
   * lifecycle out of order.
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
 * JSON-safe error shape used by log serializers and failure reports.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
