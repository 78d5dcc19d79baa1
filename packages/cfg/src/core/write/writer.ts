import type { Value } from "../../ports/value"
import { CfgSyntaxError, CfgWriteError, kindLabel } from "../errors/cfg-errors"
import type { ConfigDocument } from "../model/config-document"
import type { Section } from "../model/section"
import { parse } from "../parse"
import { valuesEqual } from "../values"

export type StringifyOptions = {
  /** `"="` is written with a space before it, as `key = value`. @default ":" */
  separator?: ":" | "="
  /** Prefix of continuation lines. @default "    " */
  indent?: string
}

type Rendered = { inline: string } | { lines: string[] }

/**
 * Writes a document back in the surface syntax. Sections are separated by a
 * blank line, keys keep their order, comments are not preserved.
 *
 * Every section header and entry is read back before it is accepted, so the
 * output always parses to an equal document.
 *
 * @throws {CfgWriteError} for a header or value with no faithful spelling,
 * e.g. `String("16")`, which would read back as a number.
 */
export function stringify(document: ConfigDocument, options: StringifyOptions = {}): string {
  const separator = options.separator === "=" ? " =" : ":"
  const indent = options.indent ?? "    "

  if (!/^[ \t]+$/.test(indent)) {
    throw new RangeError("indent must be one or more spaces or tabs")
  }

  const blocks: string[] = []

  for (const section of document.sections()) {
    const lines = [header(section)]

    for (const { key, value } of section) {
      lines.push(entry(section, key, value, separator, indent))
    }

    blocks.push(lines.join("\n"))
  }

  return blocks.length > 0 ? `${blocks.join("\n\n")}\n` : ""
}

function header(section: Section): string {
  const text = `[${section.header}]`
  const parsed = readBack(text, section)

  const [only] = parsed.sections()
  if (parsed.size !== 1 || only?.header !== section.header) {
    throw new CfgWriteError("section name is not a valid identifier pair", section.header)
  }

  return text
}

function entry(
  section: Section,
  key: string,
  value: Value,
  separator: string,
  indent: string,
): string {
  const rendered = render(section, key, value)

  const text =
    "inline" in rendered
      ? `${key}${separator}${rendered.inline === "" ? "" : ` ${rendered.inline}`}`
      : [`${key}${separator}`, ...rendered.lines.map((line) => `${indent}${line}`)].join("\n")

  const back = readBack(`[${section.header}]\n${text}`, section, key).findSection(
    section.typeName,
    section.instanceName,
  )
  const actual = back?.size === 1 ? back.get(key) : undefined

  if (!actual) {
    throw new CfgWriteError("key does not read back", section.header, key)
  }
  if (!valuesEqual(actual, value)) {
    const shape = actual.kind === value.kind ? "a different value" : `a ${kindLabel(actual.kind)}`
    throw new CfgWriteError(`would read back as ${shape}`, section.header, key)
  }

  return text
}

function render(section: Section, key: string, value: Value): Rendered {
  switch (value.kind) {
    case "number":
      return { inline: formatNumber(section, key, value.value) }
    case "ratio":
      if (value.value.length === 0) {
        throw new CfgWriteError("cannot write an empty ratio", section.header, key)
      }
      return {
        inline: value.value
          .map(([n, d]) => `${formatNumber(section, key, n)}:${formatNumber(section, key, d)}`)
          .join(", "),
      }
    case "number_array": {
      const items = value.value.map((n) => formatNumber(section, key, n))
      if (items.length === 0) {
        throw new CfgWriteError("cannot write an empty number array", section.header, key)
      }
      // a lone number on the key line would read back as a plain number
      return items.length === 1 ? { lines: items } : { inline: items.join(", ") }
    }
    case "string":
      return value.value.includes("\n") ? { lines: value.value.split("\n") } : { inline: value.value }
    case "string_array":
      return { inline: value.value.join(", ") }
  }
}

function formatNumber(section: Section, key: string, n: number): string {
  if (!Number.isFinite(n)) {
    throw new CfgWriteError(`cannot write ${n}`, section.header, key)
  }
  return String(n)
}

function readBack(text: string, section: Section, key?: string): ConfigDocument {
  try {
    return parse(text)
  } catch (error) {
    if (error instanceof CfgSyntaxError) {
      throw new CfgWriteError("output would not parse", section.header, key, error)
    }
    throw error
  }
}
