import { CfgSyntaxError } from "../../errors/cfg-errors"
import { parseTree } from "../parser"

function syntaxError(text: string): CfgSyntaxError {
  try {
    parseTree(text)
  } catch (error) {
    if (error instanceof CfgSyntaxError) return error
    throw error
  }
  throw new Error("expected a syntax error")
}

describe("parseTree", () => {
  describe("structure", () => {
    it("accepts empty input and comment-only input", () => {
      expect(parseTree("").sections).toEqual([])
      expect(parseTree("# nothing yet\n\n   \n  # indented comment\n").sections).toEqual([])
    })

    it("reads headers with and without an instance name", () => {
      const tree = parseTree("[mcu]\n[heater_generic chamber]\n[fan]\n")

      expect(tree.sections.map((s) => [s.typeName.text, s.instanceName?.text])).toEqual([
        ["mcu", undefined],
        ["heater_generic", "chamber"],
        ["fan", undefined],
      ])
    })

    it("accepts a comment after a header", () => {
      const tree = parseTree("[printer] ; main\n[mcu] # board\n")

      expect(tree.sections).toHaveLength(2)
    })

    it("accepts ':' and '=' as key separators", () => {
      const tree = parseTree("[printer]\nmax_velocity = 300\nmax_accel:3000\n")

      expect(tree.sections[0]?.entries.map((e) => e.key.text)).toEqual(["max_velocity", "max_accel"])
    })

    it("accepts identifiers with unicode letters", () => {
      const tree = parseTree("[résumé_ß]\nclé: 1\n")

      expect(tree.sections[0]?.typeName.text).toBe("résumé_ß")
      expect(tree.sections[0]?.entries[0]?.key.text).toBe("clé")
    })

    it("tolerates CRLF line endings and a missing final newline", () => {
      const tree = parseTree("[mcu]\r\nserial: /dev/ttyUSB0\r\n\r\n[printer]\r\nmax_velocity: 300")

      expect(tree.sections).toHaveLength(2)
      expect(tree.sections[1]?.entries[0]?.value).toMatchObject({ kind: "number" })
    })

    it("names the alternative that matched", () => {
      const tree = parseTree("[s]\na: 1\nb: 1, 2\nc: 1:2\nd: x\ne: x, y\nf:\n  1\ng:\n  x\n")

      expect(tree.sections[0]?.entries.map((e) => e.value.kind)).toEqual([
        "number",
        "number_array",
        "ratio",
        "string",
        "string_array",
        "multiline_number_array",
        "multiline_string",
      ])
    })
  })

  describe("spans", () => {
    it("reports byte offsets and character columns around multi-byte text", () => {
      const [section] = parseTree("[s]\nname: Thermistör 100kΩ\nk:\n  1\n  2\n").sections

      expect(section?.entries[0]?.span.end).toEqual({ offset: 28, line: 2, column: 23 })
      expect(section?.entries[1]?.value.span).toEqual({
        start: { offset: 34, line: 4, column: 3 },
        end: { offset: 39, line: 5, column: 4 },
      })
      expect(section?.span.end).toEqual({ offset: 39, line: 5, column: 4 })
    })

    const text = "# head\n[stepper_x]\nstep_pin: PF0\nmicrosteps: 16 ; steps\n"
    const section = parseTree(text).sections[0]

    it("covers a section from '[' to the end of its last value", () => {
      expect(section?.span.start).toEqual({ offset: 7, line: 2, column: 1 })
      expect(section?.span.end).toEqual({ offset: 47, line: 4, column: 15 })
    })

    it("covers a key-value pair without its trailing comment", () => {
      const entry = section?.entries[1]

      expect(entry?.span.start).toEqual({ offset: 33, line: 4, column: 1 })
      expect(entry?.span.end).toEqual({ offset: 47, line: 4, column: 15 })
      expect(entry?.value.span.start.column).toBe(13)
    })

    it("covers a multiline value from its first to its last content character", () => {
      const tree = parseTree("[s]\npoints:\n  1, 2\n  3 # end\n")
      const value = tree.sections[0]?.entries[0]?.value

      expect(value?.span.start).toEqual({ offset: 14, line: 3, column: 3 })
      expect(value?.span.end).toEqual({ offset: 22, line: 4, column: 4 })
    })
  })

  describe("syntax errors", () => {
    it("points at the newline when a header lacks ']'", () => {
      const err = syntaxError("[stepper_x\nstep_pin: PF0\n")

      expect(err.position).toEqual({ offset: 10, line: 1, column: 11 })
      expect(err.expected).toEqual(["']'"])
      expect(err.found).toBe("newline")
      expect(err.message).toBe("1:11: expected ']', found newline")
    })

    it("points at end of input when the file ends inside a header", () => {
      const err = syntaxError("[mcu]\nserial: /dev/ttyACM0\n[printer")

      expect(err.position).toEqual({ offset: 35, line: 3, column: 9 })
      expect(err.found).toBe("end of input")
    })

    it("requires an instance name after a space in the header", () => {
      const err = syntaxError("[stepper_x \n")

      expect(err.position.column).toBe(12)
      expect(err.expected).toEqual(["instance name"])
    })

    it("rejects whitespace just inside the brackets", () => {
      expect(syntaxError("[ fan ]\n")).toMatchObject({
        position: { offset: 1, line: 1, column: 2 },
        expected: ["section name"],
        found: "' '",
      })
      expect(syntaxError("[stepper_x ]\n")).toMatchObject({
        position: { offset: 11, line: 1, column: 12 },
        expected: ["instance name"],
        found: "']'",
      })
      expect(syntaxError("[heater_generic chamber ]\n")).toMatchObject({
        position: { column: 24 },
        expected: ["']'"],
        found: "' '",
      })
    })

    it("rejects a third name in a header", () => {
      const err = syntaxError("[a b c]\n")

      expect(err.position.column).toBe(5)
      expect(err.expected).toEqual(["']'"])
      expect(err.found).toBe("' '")
    })

    it("counts the offset in UTF-8 bytes after non-ASCII text", () => {
      const err = syntaxError("[extruder]\nsensor_type: Thermistör 100kΩ\n[mcu")

      expect(err.position).toEqual({ offset: 47, line: 3, column: 5 })
      expect(err.found).toBe("end of input")
    })

    it("rejects an empty header", () => {
      const err = syntaxError("[]\n")

      expect(err.expected).toEqual(["section name"])
      expect(err.position.column).toBe(2)
    })

    it("rejects text after a header", () => {
      const err = syntaxError("[mcu] extra\n")

      expect(err.position.column).toBe(7)
      expect(err.expected).toEqual(["comment", "end of line"])
    })

    it("rejects a key before any section", () => {
      const err = syntaxError("# preamble\nserial: /dev/ttyACM0\n")

      expect(err.position).toEqual({ offset: 11, line: 2, column: 1 })
      expect(err.expected).toEqual(["section header"])
    })

    it("rejects a key without a separator", () => {
      const err = syntaxError("[mcu]\nserial /dev/ttyACM0\n")

      expect(err.position).toEqual({ offset: 13, line: 2, column: 8 })
      expect(err.expected).toEqual(["':'", "'='"])
      expect(err.found).toBe("'/'")
    })

    it("rejects a line that does not start with a key", () => {
      const err = syntaxError("[mcu]\n-serial: x\n")

      expect(err.position.column).toBe(1)
      expect(err.expected).toEqual(["key", "section header"])
    })

    it("rejects an indented line after a single-line value", () => {
      const err = syntaxError("[macro]\ngcode: G28\n  G1 Z5\n")

      expect(err.position).toEqual({ offset: 21, line: 3, column: 3 })
      expect(err.expected).toEqual(["key", "section header"])
    })

    it("reports the continuation line that no multiline form accepts", () => {
      const err = syntaxError("[macro]\ngcode:\n  G28\n  ;G1\n")

      expect(err.position).toEqual({ offset: 23, line: 4, column: 3 })
      expect(err.expected).toEqual(["string"])
      expect(err.found).toBe("';'")
    })

    it("carries the position in the error context", () => {
      const err = syntaxError("[x\n")

      expect(err.code).toBe("cfg_syntax_error")
      expect(err.context).toMatchObject({ line: 1, column: 3, offset: 2, found: "newline" })
    })
  })
})
