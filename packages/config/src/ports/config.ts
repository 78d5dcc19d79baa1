/**
 * Validated configuration with a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({
 *     log_level: z.enum(logLevelNames).default("info"),
 *     instances: z.record(z.string(), instanceSchema),
 *   }),
 *   sources: [new JsonSource({ file: "gantry.json", required: true }), new EnvSource({ prefix: "GANTRY_" })],
 * })
 *
 * config.get("log_level")      // "debug"
 * config.explain("log_level")  // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** The whole validated object, frozen. */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one kept value, in first-use order. */
  sourcesUsed(): string[]

  /**
   * Keys some source supplied that the schema does not know. Usually a typo
   * or a setting left over from an older release.
   */
  unknownKeys(): string[]
}
