import { type CfgSyntaxError, expectation } from "./cfg-errors"

/**
 * Renders a syntax error the way an operator reads it: location, what was
 * expected, and the offending line with a caret under the column.
 *
 * ```text
 * printer.cfg:3:11: expected ']', found newline
 *   |
 * 3 | [stepper_x
 *   |           ^
 * ```
 */
export function formatSyntaxError(error: CfgSyntaxError, source: string, file?: string): string {
  const { line, column } = error.position
  const location = file === undefined ? `${line}:${column}` : `${file}:${line}:${column}`

  const text = (source.split("\n")[line - 1] ?? "").replace(/\r$/, "")
  const gutter = " ".repeat(String(line).length)
  // keep tabs so the caret lines up with the source line
  const pad = text.slice(0, column - 1).replace(/[^\t]/g, " ")

  return [
    `${location}: ${expectation(error.expected, error.found)}`,
    `${gutter} |`,
    `${line} | ${text}`,
    `${gutter} | ${pad}^`,
  ].join("\n")
}
