import type { Token } from "../../ports/parse-tree"
import type { Cursor } from "./cursor"

export const IDENT = /[\p{L}_][\p{L}\p{N}_]*/uy

export const NUMBER = /-?(?:0|[1-9][0-9]*)(?:\.[0-9]*)?(?:[eE][+-]?[0-9]+)?/y

export function identToken(c: Cursor): Token | undefined {
  const start = c.pos
  return c.match(IDENT) === undefined ? undefined : c.token(start)
}

export function numberToken(c: Cursor): Token | undefined {
  const start = c.pos
  return c.match(NUMBER) === undefined ? undefined : c.token(start)
}

/**
 * Finishes a line: optional whitespace, an optional `;` or `#` comment, then
 * the newline or end of input. Leaves the cursor on the newline. On failure
 * the cursor does not move.
 */
export function completeLine(c: Cursor): boolean {
  const start = c.pos

  c.skipInlineWhitespace()

  const ch = c.peek()
  if (ch === ";" || ch === "#") c.skipToLineEnd()

  if (c.atLineEnd()) return true

  c.pos = start
  return false
}

/** Whitespace-only line, or one whose first visible character is `#`. */
export function isCommentOrBlankLine(c: Cursor, lineStart: number): boolean {
  let i = lineStart
  while (c.isInlineWhitespace(i)) i++

  const ch = c.text[i]
  return ch === undefined || ch === "\n" || ch === "#"
}

/** Indented line with visible content; only a multiline value may own it. */
export function isContinuationLine(c: Cursor, lineStart: number): boolean {
  return c.isInlineWhitespace(lineStart) && !isCommentOrBlankLine(c, lineStart)
}
