/** Machine-readable error code, always lower snake case (e.g. `cfg_syntax_error`). */
export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error: file names, section headers, keys, positions.
 * Kept separate from the message so callers never have to parse text.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /**
   * `true` for failures caused by the input (malformed file, missing key),
   * `false` for broken invariants inside this codebase.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, used for log payloads and IPC replies.
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
