export type ErrorCode = Lowercase<string>

/**
 * Structured facts attached to an error (file paths, line numbers, variable
 * names). Never secret values.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError<C extends ErrorCode = ErrorCode> extends Error {
  /** Error code for programmatic handling */
  readonly code: C

  /** Structured metadata for diagnostics */
  readonly context: ErrorContext

  /**
   * `true` for expected failures caused by the environment being resolved
   * (a missing file, a malformed line, an unreachable secret provider);
   * `false` for programmer errors and broken invariants.
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
 * Serialized error shape for logs and JSON output. JSON.stringify-safe.
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
