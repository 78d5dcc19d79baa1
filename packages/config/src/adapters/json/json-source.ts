import fs from "node:fs/promises"
import path from "node:path"
import { ConfigFileError, isMissingFile } from "../../core/errors"
import type { ConfigSource } from "../../ports/source"

export type JsonSourceOptions = {
  /**
   * Absolute, or relative to `cwd`.
   *
   * @example "gantry.json", "./etc/gantry.json"
   */
  file: string

  /** When false, a missing file loads as `{}`. Any other failure still throws. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/** Reads one JSON object. Nested objects are kept as they are. */
export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) return {}
      throw ConfigFileError.fromReadError(this.opts.file, err)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw ConfigFileError.fromReadError(this.opts.file, err)
    }

    if (!isRecord(parsed)) {
      throw new ConfigFileError(`${this.opts.file}: expected a JSON object at the top level`, {
        file: this.opts.file,
      })
    }

    return parsed
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
