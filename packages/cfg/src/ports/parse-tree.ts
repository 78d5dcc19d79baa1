import type { SourceSpan } from "./source-span"

/** A matched piece of source text. */
export type Token = Readonly<{
  text: string
  span: SourceSpan
}>

export type RatioPairNode = readonly [numerator: Token, denominator: Token]

/**
 * One matched `VALUE`. The `kind` names the grammar alternative that won,
 * which is not always the kind of the resolved value (both array forms
 * resolve to `number_array`).
 */
export type ValueNode = Readonly<
  | { kind: "multiline_number_array"; lines: readonly (readonly Token[])[]; span: SourceSpan }
  | { kind: "multiline_string"; lines: readonly Token[]; span: SourceSpan }
  | { kind: "ratio"; pairs: readonly RatioPairNode[]; span: SourceSpan }
  | { kind: "number_array"; items: readonly Token[]; span: SourceSpan }
  | { kind: "number"; token: Token; span: SourceSpan }
  | { kind: "string_array"; items: readonly Token[]; span: SourceSpan }
  | { kind: "string"; token: Token; span: SourceSpan }
>

export type ValueNodeKind = ValueNode["kind"]

export type KeyValueNode = Readonly<{
  key: Token
  value: ValueNode
  span: SourceSpan
}>

export type SectionNode = Readonly<{
  typeName: Token
  instanceName?: Token
  entries: readonly KeyValueNode[]
  /** From `[` to the end of the last value (or of the header when empty). */
  span: SourceSpan
}>

export type ConfigNode = Readonly<{
  sections: readonly SectionNode[]
}>
