import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { CfgSyntaxError } from "@gantry/cfg"
import type { Logger } from "@gantry/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import { ConfigFileError } from "../errors"
import { loadPrinterConfig } from "../printer-config"

describe("loadPrinterConfig", () => {
  let cwd: string
  let logger: MockProxy<Logger>

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "printer-config-"))
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  const write = (text: string) => fs.writeFile(path.join(cwd, "printer.cfg"), text)

  it("returns the parsed document", async () => {
    await write("[printer]\nkinematics: corexy\nmax_velocity: 300\n")

    const doc = await loadPrinterConfig("printer.cfg", { cwd, logger })

    expect(doc.section("printer").asString("kinematics")).toBe("corexy")
    expect(doc.section("printer").asNumber("max_velocity")).toBe(300)
  })

  it("logs under a child bound to the file", async () => {
    await write("[printer]\nkinematics: corexy\n\n[mcu]\nserial: /dev/ttyACM0\n")

    await loadPrinterConfig("printer.cfg", { cwd, logger })

    expect(logger.child).toHaveBeenCalledWith({ module: "printer-config", file: "printer.cfg" })
    expect(logger.info).toHaveBeenCalledWith("printer config loaded", { sections: 2 })
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("warns once per duplicate", async () => {
    await write("[printer]\nmax_velocity: 300\nmax_velocity: 500\n\n[printer]\nmax_accel: 3000\n")

    const doc = await loadPrinterConfig("printer.cfg", { cwd, logger })

    expect(doc.section("printer").asNumber("max_accel")).toBe(3000)
    expect(logger.warn).toHaveBeenCalledTimes(2)
    expect(logger.warn).toHaveBeenNthCalledWith(
      1,
      "'max_velocity' repeats the one on line 2; the later value is used",
      { line: 3, section: "printer", key: "max_velocity" },
    )
    expect(logger.warn).toHaveBeenNthCalledWith(
      2,
      "[printer] repeats the section on line 1; lookups use the later one",
      { line: 5, section: "printer" },
    )
  })

  it("wraps a syntax error with its location and source line", async () => {
    await write("[printer]\nkinematics corexy\n")

    const load = loadPrinterConfig("printer.cfg", { cwd, logger })

    await expect(load).rejects.toBeInstanceOf(ConfigFileError)
    await expect(load).rejects.toThrow(
      [
        "printer.cfg:2:12: expected ':' or '=', found 'c'",
        "  |",
        "2 | kinematics corexy",
        "  |            ^",
      ].join("\n"),
    )
    await expect(load).rejects.toMatchObject({
      context: { file: "printer.cfg", line: 2, column: 12 },
      cause: expect.any(CfgSyntaxError),
    })
    expect(logger.error).toHaveBeenCalledWith("printer config has a syntax error", {
      err: expect.any(ConfigFileError),
      line: 2,
      column: 12,
    })
  })

  it("wraps a read failure", async () => {
    const load = loadPrinterConfig("missing.cfg", { cwd, logger })

    await expect(load).rejects.toMatchObject({
      code: "config_file_error",
      context: { file: "missing.cfg" },
    })
    expect(logger.error).toHaveBeenCalledWith("cannot read printer config", {
      err: expect.any(ConfigFileError),
    })
  })

  it("runs without a logger", async () => {
    await write("[mcu]\nserial: /dev/ttyACM0\n")

    const doc = await loadPrinterConfig("printer.cfg", { cwd })

    expect(doc.size).toBe(1)
  })
})
