export { type CfgSourceOptions, CfgSource, type PrinterRecord, toRecord } from "./adapters/cfg/cfg-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { Config } from "./core/config"
export {
  type ConfigErrorCode,
  ConfigFileError,
  ConfigValidationError,
  type FileLocation,
} from "./core/errors"
export {
  GANTRY_ENV_PREFIX,
  type GantryConfig,
  type GantryInstance,
  gantryConfigSchema,
  instanceSchema,
  type LoadGantryConfigOptions,
  loadGantryConfig,
  resolveInstanceConfigPath,
} from "./core/gantry-config"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { type LoadPrinterConfigOptions, loadPrinterConfig } from "./core/printer-config"
export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"
