import { parse } from "../../parse"
import { CfgSyntaxError } from "../cfg-errors"
import { formatSyntaxError } from "../format-syntax-error"

function syntaxError(text: string): CfgSyntaxError {
  try {
    parse(text)
  } catch (error) {
    if (error instanceof CfgSyntaxError) return error
    throw error
  }
  throw new Error("expected a syntax error")
}

describe("formatSyntaxError", () => {
  it("points a caret at the offending column", () => {
    const source = "[mcu]\nserial /dev/ttyACM0\n"

    expect(formatSyntaxError(syntaxError(source), source, "printer.cfg")).toBe(
      [
        "printer.cfg:2:8: expected ':' or '=', found '/'",
        "  |",
        "2 | serial /dev/ttyACM0",
        "  |        ^",
      ].join("\n"),
    )
  })

  it("omits the file name when none is given", () => {
    const source = "[stepper_x\n"

    expect(formatSyntaxError(syntaxError(source), source).split("\n")[0]).toBe(
      "1:11: expected ']', found newline",
    )
  })

  it("keeps tabs in the caret line", () => {
    const source = "[mcu]\n\tserial: /dev/ttyACM0\n"

    expect(formatSyntaxError(syntaxError(source), source).split("\n").slice(2)).toEqual([
      "2 | \tserial: /dev/ttyACM0",
      "  | \t^",
    ])
  })

  it("strips the carriage return of a CRLF line", () => {
    const source = "[mcu]\r\nserial /dev/ttyACM0\r\n"

    expect(formatSyntaxError(syntaxError(source), source).split("\n")[2]).toBe(
      "2 | serial /dev/ttyACM0",
    )
  })

  it("widens the gutter for multi-digit line numbers", () => {
    const source = `[mcu]\n${"#\n".repeat(8)}serial /dev/ttyACM0\n`

    expect(formatSyntaxError(syntaxError(source), source).split("\n").slice(1)).toEqual([
      "   |",
      "10 | serial /dev/ttyACM0",
      "   |        ^",
    ])
  })
})
