import { type ConfigDocument, type PlainValue, toPlain } from "@gantry/cfg"
import type { Logger } from "@gantry/logger"
import { loadPrinterConfig } from "../../core/printer-config"
import type { ConfigSource } from "../../ports/source"

export type CfgSourceOptions = {
  /** Printer configuration file, absolute or relative to `cwd`. */
  file: string
  /** @default process.cwd() */
  cwd?: string
  logger?: Logger
}

export type PrinterRecord = Record<string, Record<string, PlainValue>>

/**
 * Exposes a printer `.cfg` file as a nested record, one entry per section
 * header, so printer settings can be validated by a zod schema through
 * `loadConfig`.
 *
 * ```ts
 * { stepper_z: { microsteps: 16, gear_ratio: [[80, 16], [3, 1]] } }
 * ```
 */
export class CfgSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: CfgSourceOptions) {
    this.name = `cfg:${opts.file}`
  }

  async load(): Promise<PrinterRecord> {
    const document = await loadPrinterConfig(this.opts.file, {
      ...(this.opts.cwd !== undefined && { cwd: this.opts.cwd }),
      ...(this.opts.logger && { logger: this.opts.logger }),
    })

    return toRecord(document)
  }
}

/**
 * Duplicate headers collapse to the last section, as `section()` does.
 * Headers and keys such as `__proto__` become own properties.
 */
export function toRecord(document: ConfigDocument): PrinterRecord {
  return Object.fromEntries(
    [...document.sections()].map((section): [string, Record<string, PlainValue>] => [
      section.header,
      Object.fromEntries(
        [...section].map(({ key, value }): [string, PlainValue] => [key, toPlain(value)]),
      ),
    ]),
  )
}
