import type { SourceSpan } from "./source-span"
import type { Value } from "./value"

export type SectionEntry = Readonly<{
  key: string
  value: Value
  /** From the first character of the key to the end of the value. */
  span: SourceSpan
}>

/**
 * Something legal but worth telling the operator about. Duplicates resolve
 * last-wins: the later key replaces the earlier value in place, the later
 * section shadows the earlier one for lookups.
 */
export type DocumentNotice =
  | Readonly<{
      kind: "duplicate_key"
      section: string
      key: string
      span: SourceSpan
      previous: SourceSpan
    }>
  | Readonly<{
      kind: "duplicate_section"
      section: string
      span: SourceSpan
      previous: SourceSpan
    }>
