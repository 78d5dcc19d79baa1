import { createNullLogger, type Logger } from "@gantry/logger"
import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./errors"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order; later sources win. @default [new EnvSource()] */
  sources?: readonly ConfigSource[]
  logger?: Logger
}

/**
 * Loads every source, merges them shallowly, and validates the result.
 *
 * @throws {ConfigValidationError} when the merged values fail the schema.
 * Errors from a source's `load()` propagate unchanged.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
  logger = createNullLogger(),
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged = new Map<string, unknown>()
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()
    const provided = Object.entries(values).filter(([, value]) => value !== undefined)

    for (const [key, value] of provided) {
      merged.set(key, value)
      provenance.set(key, source.name)
    }

    logger.debug("config source loaded", { source: source.name, keys: provided.length })
  }

  const result = schema.safeParse(Object.fromEntries(merged))

  if (!result.success) {
    throw new ConfigValidationError(
      z.prettifyError(result.error),
      sources.map((s) => s.name),
      result.error,
    )
  }

  return new Config(result.data, provenance, new Set(merged.keys()))
}
