import { CfgSyntaxError } from "./errors/cfg-errors"
import { parseTree } from "./grammar/parser"
import type { ConfigDocument } from "./model/config-document"
import { resolveDocument } from "./resolve/resolver"

export type ParseSuccess = {
  success: true
  document: ConfigDocument
}

export type ParseFailure = {
  success: false
  error: CfgSyntaxError
}

export type ParseResult = ParseSuccess | ParseFailure

/**
 * Parses configuration text in one synchronous pass. All or nothing: the
 * first syntax error aborts the parse.
 *
 * @throws {CfgSyntaxError}
 */
export function parse(text: string): ConfigDocument {
  return resolveDocument(parseTree(text))
}

/** {@link parse} without the throw. Any other error still propagates. */
export function tryParse(text: string): ParseResult {
  try {
    return { success: true, document: parse(text) }
  } catch (error) {
    if (error instanceof CfgSyntaxError) return { success: false, error }
    throw error
  }
}
