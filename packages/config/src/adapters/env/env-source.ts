import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this are read, with the prefix removed. */
  prefix?: string
  /** Lower-cases keys once the prefix is removed, for snake_case schemas. */
  lowercase?: boolean
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Reads environment variables. With `prefix: "GANTRY_"` and `lowercase`,
 * `GANTRY_LOG_LEVEL` becomes `log_level`.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly lowercase: boolean
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.lowercase = options.lowercase ?? false
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}*` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    return Object.fromEntries(
      Object.entries(this.env)
        .filter(([key]) => key.startsWith(this.prefix) && key.length > this.prefix.length)
        .map(([key, value]): [string, string | undefined] => {
          const name = key.slice(this.prefix.length)
          return [this.lowercase ? name.toLowerCase() : name, value]
        }),
    )
  }
}
