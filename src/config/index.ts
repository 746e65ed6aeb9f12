/**
 * Configuration module exports
 */

export { DEFAULT_CONFIG, deepMerge, environmentDefaults, isPlainObject, WEBHOOK_URL_ENV } from "./defaults";
export {
  buildConfig,
  CONFIG_FILE_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
export { resolvePaths } from "./resolver";
export { validateConfig } from "./validator";
