import type { DocumentNotice, SectionEntry } from "../../ports/document"
import type { ConfigNode, SectionNode, Token, ValueNode } from "../../ports/parse-tree"
import type { SourceSpan } from "../../ports/source-span"
import { type RatioPair, Value } from "../../ports/value"
import { sectionHeader } from "../errors/cfg-errors"
import { ConfigDocument } from "../model/config-document"
import { Section } from "../model/section"

/**
 * Turns one matched value into its typed form. Purely syntactic: nothing here
 * looks at what the key means.
 */
export function resolveValue(node: ValueNode): Value {
  switch (node.kind) {
    case "number":
      return Value.number(toNumber(node.token))
    case "number_array":
      return Value.numberArray(node.items.map(toNumber))
    case "multiline_number_array":
      return Value.numberArray(node.lines.flat().map(toNumber))
    case "ratio":
      return Value.ratio(node.pairs.map(([n, d]): RatioPair => [toNumber(n), toNumber(d)]))
    case "string":
      return Value.string(node.token.text.trim())
    case "multiline_string":
      return Value.string(node.lines.map((line) => line.text.trim()).join("\n"))
    case "string_array":
      return Value.stringArray(node.items.map((item) => item.text.trim()))
  }
}

/** Builds the queryable document and records every duplicate it resolves. */
export function resolveDocument(tree: ConfigNode): ConfigDocument {
  const notices: DocumentNotice[] = []
  const headers = new Map<string, SourceSpan>()

  const sections = tree.sections.map((node) => {
    const header = sectionHeader(node.typeName.text, node.instanceName?.text)

    const previous = headers.get(header)
    if (previous) {
      notices.push({ kind: "duplicate_section", section: header, span: node.span, previous })
    }
    headers.set(header, node.span)

    return new Section({
      typeName: node.typeName.text,
      ...(node.instanceName && { instanceName: node.instanceName.text }),
      entries: resolveEntries(node, header, notices),
      span: node.span,
    })
  })

  return new ConfigDocument(sections, notices)
}

function resolveEntries(
  node: SectionNode,
  header: string,
  notices: DocumentNotice[],
): SectionEntry[] {
  const entries = new Map<string, SectionEntry>()

  for (const { key, value, span } of node.entries) {
    const previous = entries.get(key.text)
    if (previous) {
      notices.push({
        kind: "duplicate_key",
        section: header,
        key: key.text,
        span,
        previous: previous.span,
      })
    }

    // Map.set keeps the first insertion's position
    entries.set(key.text, { key: key.text, value: resolveValue(value), span })
  }

  return [...entries.values()]
}

function toNumber(token: Token): number {
  return Number(token.text)
}
