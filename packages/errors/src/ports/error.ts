export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (backend names, argument values,
 * config keys) so callers never have to parse messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad configuration, unreachable
   * backend), `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in logs.
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
