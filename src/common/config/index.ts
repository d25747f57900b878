/**
 * Config Module - Public Exports
 */

export {
  type TranspilerConfig,
  type ConfigKey,
  type ValidationResult,
  DEFAULT_CONFIG,
  CONFIG_KEYS,
  isConfigKey,
  validateValue,
} from "./types.ts";

export { CONFIG_FILE_NAME, loadConfig, resolveConfig } from "./storage.ts";
