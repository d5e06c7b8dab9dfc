export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors.
 * Carries the offending input, the expected shape, a field path and the like
 * so that callers never have to pick them back out of the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling, e.g. `invalid_value` */
  readonly code: ErrorCode

  /** Structured metadata for diagnostics */
  readonly context: ErrorContext

  /**
   * `true` if repeating the same call might succeed.
   *
   * @remarks
   * Parsing and formatting are deterministic, so nothing raised by the codec
   * packages sets this.
   */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (true) or a programmer
   * error / invariant violation (false).
   *
   * @remarks
   * - Operational (`true`): text that does not parse, a value of the wrong type.
   * - Non-operational (`false`): building a negative duration, reading a
   *   consumed wrapper.
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
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
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
