export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (profile name, file path, source...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Machine-readable code, e.g. `not_found` */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for expected runtime failures (missing profile, unreadable file),
   * `false` for programmer errors and anything caught without a code.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used as the `err` field of log entries.
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
