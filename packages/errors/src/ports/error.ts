export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (positions, sizes, offending values).
 * Kept separate from the message so log processors can index it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Whether this is an expected runtime failure (true) or a defect in the
   * calling code (false).
   *
   * @remarks
   * - Operational (`true`): truncated or malformed input from a peer.
   * - Non-operational (`false`): broken precondition, invalid configuration.
   *
   * A decoder may drop the current message on an operational error; a
   * non-operational one should not be caught and retried.
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
 * Serialized error shape for logging and transport. JSON.stringify-safe.
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
