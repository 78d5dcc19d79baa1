import { BaseError } from "@gantry/errors"
import type { SourcePosition } from "../../ports/source-span"
import type { ValueKind } from "../../ports/value"

export type CfgErrorCode =
  | "cfg_syntax_error"
  | "cfg_section_not_found"
  | "cfg_missing_key"
  | "cfg_type_mismatch"
  | "cfg_write_error"

/**
 * The input does not match the grammar. Parsing stops at the first such
 * position; no partial document exists.
 */
export class CfgSyntaxError extends BaseError<"cfg_syntax_error"> {
  constructor(
    readonly position: SourcePosition,
    readonly expected: readonly string[],
    readonly found: string,
  ) {
    super(`${position.line}:${position.column}: ${expectation(expected, found)}`, {
      code: "cfg_syntax_error",
      context: { ...position, expected, found },
    })
  }
}

export class SectionNotFoundError extends BaseError<"cfg_section_not_found"> {
  constructor(
    readonly typeName: string,
    readonly instanceName?: string,
  ) {
    super(`no [${sectionHeader(typeName, instanceName)}] section`, {
      code: "cfg_section_not_found",
      context: { typeName, instanceName },
    })
  }
}

export class MissingKeyError extends BaseError<"cfg_missing_key"> {
  constructor(
    readonly section: string,
    readonly key: string,
  ) {
    super(`[${section}] has no '${key}'`, {
      code: "cfg_missing_key",
      context: { section, key },
    })
  }
}

export class TypeMismatchError extends BaseError<"cfg_type_mismatch"> {
  constructor(
    readonly section: string,
    readonly key: string,
    readonly expected: ValueKind,
    readonly actual: ValueKind,
  ) {
    super(`[${section}] '${key}' is a ${kindLabel(actual)}, expected a ${kindLabel(expected)}`, {
      code: "cfg_type_mismatch",
      context: { section, key, expected, actual },
    })
  }
}

/** A section or value the surface syntax cannot express so that it reads back unchanged. */
export class CfgWriteError extends BaseError<"cfg_write_error"> {
  constructor(
    message: string,
    readonly section: string,
    readonly key?: string,
    cause?: unknown,
  ) {
    super(key === undefined ? `[${section}]: ${message}` : `[${section}] '${key}': ${message}`, {
      code: "cfg_write_error",
      context: { section, key },
      cause,
    })
  }
}

export function expectation(expected: readonly string[], found: string): string {
  return `expected ${expected.join(" or ")}, found ${found}`
}

export function sectionHeader(typeName: string, instanceName?: string): string {
  return instanceName === undefined ? typeName : `${typeName} ${instanceName}`
}

export function kindLabel(kind: ValueKind): string {
  return kind.replace("_", " ")
}
