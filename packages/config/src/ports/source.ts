/**
 * A source of raw configuration values.
 *
 * A source only *loads*. Validation, coercion and merging happen in
 * `loadConfig`, which applies sources in order so later ones override
 * earlier ones key by key.
 */
export interface ConfigSource {
  /**
   * Shown in provenance and logs.
   * Example: "env", "json:gantry.json", "cfg:printer.cfg"
   */
  readonly name: string

  /**
   * - `EnvSource` returns flat strings
   * - `JsonSource` and `CfgSource` may return nested records
   * - an `undefined` value means "not provided" and overrides nothing
   *
   * Every call returns a fresh object.
   */
  load(): Promise<Record<string, unknown>>
}
