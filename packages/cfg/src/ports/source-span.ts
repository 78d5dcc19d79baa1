/**
 * A point in the source text. `offset` is the UTF-8 byte offset from the start
 * of the input; `line` and `column` are 1-based, with `column` counted in
 * characters of the line as a JavaScript string.
 */
export type SourcePosition = Readonly<{
  offset: number
  line: number
  column: number
}>

/** Half-open range `[start, end)`. */
export type SourceSpan = Readonly<{
  start: SourcePosition
  end: SourcePosition
}>
