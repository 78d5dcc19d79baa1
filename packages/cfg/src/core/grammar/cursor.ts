import type { Token } from "../../ports/parse-tree"
import type { SourcePosition, SourceSpan } from "../../ports/source-span"
import { CfgSyntaxError } from "../errors/cfg-errors"

const INLINE_WHITESPACE = new Set([" ", "\t", "\r"])

/**
 * Read position over the whole input. Rules move `pos` forward and restore it
 * when an alternative fails, so backtracking is just an assignment.
 */
export class Cursor {
  pos = 0

  /** String index of each line's first character. */
  private readonly lineStarts: number[] = [0]
  /** UTF-8 byte offset of the same characters. */
  private readonly lineByteStarts: number[] = [0]
  private furthest: { offset: number; expected: string[] } | undefined

  constructor(readonly text: string) {
    let lineStart = 0
    let bytes = 0

    for (let i = 0; i < text.length; i++) {
      if (text[i] !== "\n") continue

      bytes += Buffer.byteLength(text.slice(lineStart, i + 1), "utf8")
      lineStart = i + 1
      this.lineStarts.push(lineStart)
      this.lineByteStarts.push(bytes)
    }
  }

  get eof(): boolean {
    return this.pos >= this.text.length
  }

  peek(): string | undefined {
    return this.text[this.pos]
  }

  atLineEnd(): boolean {
    return this.eof || this.text[this.pos] === "\n"
  }

  isInlineWhitespace(offset: number = this.pos): boolean {
    const ch = this.text[offset]
    return ch !== undefined && INLINE_WHITESPACE.has(ch)
  }

  /** Skips spaces, tabs and carriage returns. Returns how many were skipped. */
  skipInlineWhitespace(): number {
    const start = this.pos
    while (this.isInlineWhitespace()) this.pos++
    return this.pos - start
  }

  consume(ch: string): boolean {
    if (this.text[this.pos] !== ch) return false
    this.pos++
    return true
  }

  /** Matches a sticky regular expression at the current position. */
  match(pattern: RegExp): string | undefined {
    pattern.lastIndex = this.pos
    const m = pattern.exec(this.text)
    if (!m) return undefined
    this.pos += m[0].length
    return m[0]
  }

  /** Offset of the `\n` ending the line that contains `offset`, or the input length. */
  lineEnd(offset: number = this.pos): number {
    const nl = this.text.indexOf("\n", offset)
    return nl === -1 ? this.text.length : nl
  }

  skipToLineEnd(): void {
    this.pos = this.lineEnd()
  }

  /**
   * Position of the string index `index`. `offset` is counted in UTF-8 bytes,
   * `column` in string characters from the line start.
   */
  position(index: number = this.pos): SourcePosition {
    let lo = 0
    let hi = this.lineStarts.length - 1

    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1
      if ((this.lineStarts[mid] ?? 0) <= index) lo = mid
      else hi = mid - 1
    }

    const lineStart = this.lineStarts[lo] ?? 0
    const offset =
      (this.lineByteStarts[lo] ?? 0) + Buffer.byteLength(this.text.slice(lineStart, index), "utf8")

    return { offset, line: lo + 1, column: index - lineStart + 1 }
  }

  /** String index of a position built by {@link position}. */
  indexOf(position: SourcePosition): number {
    return (this.lineStarts[position.line - 1] ?? 0) + position.column - 1
  }

  span(start: number, end: number = this.pos): SourceSpan {
    return { start: this.position(start), end: this.position(end) }
  }

  token(start: number, end: number = this.pos): Token {
    return { text: this.text.slice(start, end), span: this.span(start, end) }
  }

  describe(offset: number = this.pos): string {
    const ch = this.text.codePointAt(offset)
    if (ch === undefined) return "end of input"
    if (ch === 0x0a) return "newline"
    return `'${String.fromCodePoint(ch)}'`
  }

  /**
   * Records where an alternative gave up. A later structural error reports the
   * furthest recorded failure instead when that one got deeper into the input.
   */
  noteFailure(expected: readonly string[], offset: number = this.pos): void {
    if (!this.furthest || offset > this.furthest.offset) {
      this.furthest = { offset, expected: [...expected] }
    } else if (offset === this.furthest.offset) {
      for (const e of expected) {
        if (!this.furthest.expected.includes(e)) this.furthest.expected.push(e)
      }
    }
  }

  fail(expected: readonly string[], offset: number = this.pos): CfgSyntaxError {
    const at = this.furthest && this.furthest.offset > offset ? this.furthest : { offset, expected }
    return new CfgSyntaxError(this.position(at.offset), at.expected, this.describe(at.offset))
  }
}
