export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the fragment, profile or process
 * involved, source positions, and so on.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for diagnostics */
  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by input (a malformed fragment, an
   * unknown profile), `false` for invariant violations inside the engine.
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
 * Serialized error shape for logs and host-facing reports.
 *
 * Safe to pass to `JSON.stringify`.
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
