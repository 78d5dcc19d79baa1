import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Turn anything that was thrown into a {@link SerializedError}.
 *
 * `BaseError` keeps its code and context, other `Error`s get code `unknown`,
 * and non-errors are wrapped with the raw value in `context.value`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  // foreign errors carry no code and count as bugs
  const own =
    err instanceof BaseError
      ? {
          code: err.code,
          context: { ...err.context },
          isOperational: err.isOperational,
          at: err.timestamp,
        }
      : { code: "unknown", context: {}, isOperational: false, at: new Date() }

  return {
    name: err.name,
    code: own.code,
    message: err.message,
    context: own.context,
    isOperational: own.isOperational,
    timestamp: own.at.toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options?.includeStack && err.stack && { stack: err.stack }),
  }
}
