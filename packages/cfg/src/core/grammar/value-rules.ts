import type { RatioPairNode, Token, ValueNode } from "../../ports/parse-tree"
import type { SourceSpan } from "../../ports/source-span"
import type { Cursor } from "./cursor"
import {
  completeLine,
  isCommentOrBlankLine,
  isContinuationLine,
  numberToken,
} from "./lexical"

type Alternative = (c: Cursor) => ValueNode | undefined

/**
 * `VALUE` alternatives in priority order. The first one that matches through
 * the end of its line (or of its continuation lines) wins, so numeric forms
 * always shadow the string forms that would also accept the same text.
 */
const VALUE_ALTERNATIVES: readonly Alternative[] = [
  multilineNumberArray,
  multilineString,
  ratio,
  numberArray,
  number,
  stringArray,
  singleLineString,
]

/**
 * Matches the value that starts at the cursor (just past the key separator).
 * Leaves the cursor at the end of the last line the value owns.
 */
export function parseValue(c: Cursor): ValueNode {
  for (const alternative of VALUE_ALTERNATIVES) {
    const node = alternative(c)
    if (node) return node
  }

  // singleLineString accepts any remainder, including an empty one
  throw c.fail(["value"])
}

function multilineNumberArray(c: Cursor): ValueNode | undefined {
  const match = continuation(c, () => {
    const items = numberList(c, 1)

    if (!items) {
      c.noteFailure(["number"])
      return undefined
    }

    // numberList leaves the cursor just past the last number
    const end = c.pos
    if (!completeLine(c)) {
      c.skipInlineWhitespace()
      c.noteFailure(["','", "end of line"])
      return undefined
    }

    return { item: items, end }
  })

  return match && { kind: "multiline_number_array", lines: match.items, span: match.span }
}

function multilineString(c: Cursor): ValueNode | undefined {
  const match = continuation(c, () => {
    const token = stringRun(c, ";")

    if (token.text === "") {
      c.noteFailure(["string"])
      return undefined
    }

    const end = c.pos
    completeLine(c)
    return { item: token, end }
  })

  return match && { kind: "multiline_string", lines: match.items, span: match.span }
}

function ratio(c: Cursor): ValueNode | undefined {
  return sameLine(c, (start) => {
    const first = ratioPair(c)
    if (!first) return undefined

    const pairs: RatioPairNode[] = [first]

    for (;;) {
      const save = c.pos
      const next = listSeparator(c) ? ratioPair(c) : undefined

      if (!next) {
        c.pos = save
        break
      }
      pairs.push(next)
    }

    return { kind: "ratio", pairs, span: c.span(start) }
  })
}

function numberArray(c: Cursor): ValueNode | undefined {
  return sameLine(c, (start) => {
    const items = numberList(c, 2)
    return items && { kind: "number_array", items, span: c.span(start) }
  })
}

function number(c: Cursor): ValueNode | undefined {
  return sameLine(c, (start) => {
    const token = numberToken(c)
    return token && { kind: "number", token, span: c.span(start) }
  })
}

function stringArray(c: Cursor): ValueNode | undefined {
  return sameLine(c, (start) => {
    const items: Token[] = []

    do {
      c.skipInlineWhitespace()
      const item = stringRun(c, ";,")
      if (item.text.trim() === "") return undefined
      items.push(item)
    } while (c.consume(","))

    return items.length >= 2 ? { kind: "string_array", items, span: c.span(start) } : undefined
  })
}

function singleLineString(c: Cursor): ValueNode | undefined {
  return sameLine(c, (start) => {
    const token = stringRun(c, ";")
    return { kind: "string", token, span: c.span(start) }
  })
}

/** Runs `body` and requires the rest of the line to be empty or a comment. */
function sameLine(
  c: Cursor,
  body: (start: number) => ValueNode | undefined,
): ValueNode | undefined {
  const start = c.pos
  const node = body(start)

  if (node && completeLine(c)) return node

  c.pos = start
  return undefined
}

type LineMatch<T> = { item: T; end: number }

/**
 * Matches a value written on the indented lines below the key; the key line
 * itself may only hold a comment. `line` runs once per continuation line with
 * the cursor on its first visible character, and must match every one of
 * them. `end` is the input index where the line's content stops, before any
 * comment.
 */
function continuation<T>(
  c: Cursor,
  line: () => LineMatch<T> | undefined,
): { items: T[]; span: SourceSpan } | undefined {
  const start = c.pos
  if (!completeLine(c)) return undefined

  const items: T[] = []
  let contentStart: number | undefined
  let contentEnd = c.pos
  let lineEnd = c.pos

  for (const lineStart of continuationLineStarts(c, c.pos)) {
    c.pos = lineStart
    c.skipInlineWhitespace()
    contentStart ??= c.pos

    const matched = line()
    if (!matched) {
      c.pos = start
      return undefined
    }

    items.push(matched.item)
    contentEnd = matched.end
    lineEnd = c.pos
  }

  if (contentStart === undefined) {
    c.pos = start
    return undefined
  }

  c.pos = lineEnd
  return { items, span: c.span(contentStart, contentEnd) }
}

/** Starts of the continuation lines after `lineEnd`, skipping comment and blank lines. */
function* continuationLineStarts(c: Cursor, lineEnd: number): Generator<number> {
  let end = lineEnd

  while (end < c.text.length) {
    const lineStart = end + 1

    if (isContinuationLine(c, lineStart)) yield lineStart
    else if (!isCommentOrBlankLine(c, lineStart)) return

    end = c.lineEnd(lineStart)
  }
}

function numberList(c: Cursor, min: number): Token[] | undefined {
  const first = numberToken(c)
  if (!first) return undefined

  const items = [first]

  for (;;) {
    const save = c.pos
    const next = listSeparator(c) ? numberToken(c) : undefined

    if (!next) {
      c.pos = save
      break
    }
    items.push(next)
  }

  return items.length >= min ? items : undefined
}

function ratioPair(c: Cursor): RatioPairNode | undefined {
  const start = c.pos
  const numerator = numberToken(c)

  if (numerator) {
    c.skipInlineWhitespace()

    if (c.consume(":")) {
      c.skipInlineWhitespace()

      const denominator = numberToken(c)
      if (denominator) return [numerator, denominator]
    }
  }

  c.pos = start
  return undefined
}

/** `,` with optional whitespace on both sides. */
function listSeparator(c: Cursor): boolean {
  c.skipInlineWhitespace()
  if (!c.consume(",")) return false
  c.skipInlineWhitespace()
  return true
}

/** Everything up to the line end or one of `stops`; may be empty. */
function stringRun(c: Cursor, stops: string): Token {
  const start = c.pos

  while (!c.atLineEnd()) {
    const ch = c.peek()
    if (ch !== undefined && stops.includes(ch)) break
    c.pos++
  }

  return c.token(start)
}
