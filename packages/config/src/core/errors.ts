import { type CfgSyntaxError, formatSyntaxError } from "@gantry/cfg"
import { BaseError } from "@gantry/errors"

export type ConfigErrorCode = "config_validation_failed" | "config_file_error"

/** The merged sources do not satisfy the schema. `issues` is zod's prettified report. */
export class ConfigValidationError extends BaseError<"config_validation_failed"> {
  constructor(
    readonly issues: string,
    readonly sources: readonly string[],
    cause?: unknown,
  ) {
    super(`Configuration validation failed:\n${issues}`, {
      code: "config_validation_failed",
      context: { sources },
      cause,
    })
  }
}

export type FileLocation = {
  file: string
  line?: number
  column?: number
}

/**
 * A configuration file could not be read or parsed. The message starts with
 * `file`, or `file:line:column` when the failure has a position.
 */
export class ConfigFileError extends BaseError<"config_file_error"> {
  readonly file: string

  constructor(message: string, location: FileLocation, cause?: unknown) {
    super(message, {
      code: "config_file_error",
      context: { ...location },
      cause,
    })
    this.file = location.file
  }

  /** Wraps a syntax error with the offending line and a caret under it. */
  static fromSyntaxError(file: string, source: string, error: CfgSyntaxError): ConfigFileError {
    const { line, column } = error.position

    return new ConfigFileError(formatSyntaxError(error, source, file), { file, line, column }, error)
  }

  static fromReadError(file: string, error: unknown): ConfigFileError {
    const reason = error instanceof Error ? error.message : String(error)

    return new ConfigFileError(`${file}: ${reason}`, { file }, error)
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}
