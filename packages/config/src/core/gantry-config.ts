import path from "node:path"
import { createNullLogger, type Logger, logLevelNames } from "@gantry/logger"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import { JsonSource } from "../adapters/json/json-source"
import type { IConfig } from "../ports/config"
import { loadConfig } from "./load"

export const instanceSchema = z.object({
  uuid: z.uuid(),
  config_path: z.string().min(1),
})

/**
 * Host settings: which printer instances to boot and how to log.
 *
 * ```json
 * {
 *   "instances": {
 *     "voron": { "uuid": "3f2504e0-4f89-41d3-9a0c-0305e82c3301", "config_path": "voron/printer.cfg" }
 *   },
 *   "log_level": "debug"
 * }
 * ```
 */
export const gantryConfigSchema = z.object({
  instances: z.record(z.string(), instanceSchema),
  log_level: z.enum(logLevelNames).default("info"),
  // env values arrive as strings
  log_pretty: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type GantryInstance = z.infer<typeof instanceSchema>
export type GantryConfig = z.infer<typeof gantryConfigSchema>

export const GANTRY_ENV_PREFIX = "GANTRY_"

export type LoadGantryConfigOptions = {
  /** The registry JSON file, absolute or relative to `cwd`. */
  file: string
  /** @default process.cwd() */
  cwd?: string
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
  logger?: Logger
}

/**
 * Loads the registry file, then lets `GANTRY_*` variables override its flat
 * settings (`GANTRY_LOG_LEVEL=debug`).
 *
 * @throws {ConfigFileError} when the file is missing or is not a JSON object.
 * @throws {ConfigValidationError} when the merged settings fail the schema.
 */
export async function loadGantryConfig({
  file,
  cwd,
  env,
  logger = createNullLogger(),
}: LoadGantryConfigOptions): Promise<IConfig<GantryConfig>> {
  const config = await loadConfig({
    schema: gantryConfigSchema,
    sources: [
      new JsonSource({ file, required: true, ...(cwd !== undefined && { cwd }) }),
      new EnvSource({ prefix: GANTRY_ENV_PREFIX, lowercase: true, ...(env && { env }) }),
    ],
    logger,
  })

  logger.info("gantry config loaded", {
    file,
    instances: Object.keys(config.get("instances")).length,
  })

  return config
}

/** `config_path` is relative to the directory holding the registry file. */
export function resolveInstanceConfigPath(instance: GantryInstance, baseDir: string): string {
  return path.resolve(baseDir, instance.config_path)
}
