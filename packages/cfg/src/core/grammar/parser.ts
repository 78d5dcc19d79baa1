import type { ConfigNode, KeyValueNode, SectionNode, Token } from "../../ports/parse-tree"
import { Cursor } from "./cursor"
import { completeLine, identToken, isCommentOrBlankLine } from "./lexical"
import { parseValue } from "./value-rules"

type SectionDraft = {
  start: number
  typeName: Token
  instanceName?: Token
  entries: KeyValueNode[]
  end: number
}

/**
 * Runs the grammar over the whole input and returns the parse tree.
 *
 * Lines are consumed one at a time: comment and blank lines anywhere, section
 * headers and `key: value` lines starting in column 1, and indented lines only
 * as part of a multiline value.
 *
 * @throws {CfgSyntaxError} at the first position no rule accepts.
 */
export function parseTree(text: string): ConfigNode {
  const c = new Cursor(text)
  const drafts: SectionDraft[] = []

  while (!c.eof) {
    if (isCommentOrBlankLine(c, c.pos)) {
      c.skipToLineEnd()
    } else if (c.isInlineWhitespace()) {
      c.skipInlineWhitespace()
      throw c.fail(drafts.length > 0 ? ["key", "section header"] : ["section header"])
    } else if (c.peek() === "[") {
      drafts.push(sectionHeader(c))
    } else {
      const current = drafts[drafts.length - 1]
      if (!current) throw c.fail(["section header"])

      const entry = keyValue(c)
      current.entries.push(entry)
      current.end = c.indexOf(entry.span.end)
    }

    c.consume("\n")
  }

  return {
    sections: drafts.map(
      ({ start, end, ...section }): SectionNode => ({ ...section, span: c.span(start, end) }),
    ),
  }
}

function sectionHeader(c: Cursor): SectionDraft {
  const start = c.pos
  c.consume("[")

  // no whitespace inside the brackets except between the two names
  const typeName = identToken(c)
  if (!typeName) throw c.fail(["section name"])

  let instanceName: Token | undefined
  if (c.skipInlineWhitespace() > 0) {
    instanceName = identToken(c)
    if (!instanceName) throw c.fail(["instance name"])
  }

  if (!c.consume("]")) throw c.fail(["']'"])

  const end = c.pos

  if (!completeLine(c)) {
    c.skipInlineWhitespace()
    throw c.fail(["comment", "end of line"])
  }

  return { start, typeName, ...(instanceName && { instanceName }), entries: [], end }
}

function keyValue(c: Cursor): KeyValueNode {
  const start = c.pos

  const key = identToken(c)
  if (!key) throw c.fail(["key", "section header"])

  c.skipInlineWhitespace()
  if (!c.consume(":") && !c.consume("=")) throw c.fail(["':'", "'='"])
  c.skipInlineWhitespace()

  const value = parseValue(c)

  return { key, value, span: c.span(start, c.indexOf(value.span.end)) }
}
