export {
  CfgSyntaxError,
  CfgWriteError,
  type CfgErrorCode,
  MissingKeyError,
  SectionNotFoundError,
  TypeMismatchError,
} from "./core/errors/cfg-errors"
export { formatSyntaxError } from "./core/errors/format-syntax-error"
export { parseTree } from "./core/grammar/parser"
export { ConfigDocument } from "./core/model/config-document"
export { Section, type SectionInit } from "./core/model/section"
export { type ParseFailure, type ParseResult, type ParseSuccess, parse, tryParse } from "./core/parse"
export { resolveDocument, resolveValue } from "./core/resolve/resolver"
export { isKind, type PlainValue, ratioFactor, toPlain, valuesEqual } from "./core/values"
export { type StringifyOptions, stringify } from "./core/write/writer"
export type { DocumentNotice, SectionEntry } from "./ports/document"
export type {
  ConfigNode,
  KeyValueNode,
  RatioPairNode,
  SectionNode,
  Token,
  ValueNode,
  ValueNodeKind,
} from "./ports/parse-tree"
export type { SourcePosition, SourceSpan } from "./ports/source-span"
export {
  type NumberArrayValue,
  type NumberValue,
  type RatioPair,
  type RatioValue,
  type StringArrayValue,
  type StringValue,
  Value,
  type ValueKind,
  type ValueOf,
} from "./ports/value"
