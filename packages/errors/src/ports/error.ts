export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error, e.g. the configuration class or the
 * property key involved.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Machine-readable code, lowercase snake case by convention */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for failures caused by input the caller controls (a bad property
   * value, a missing key); `false` for programmer errors such as a broken
   * attribute definition.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and reports.
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
