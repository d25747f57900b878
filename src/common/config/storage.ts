/**
 * Transpiler Config Storage
 * Loading and merging of serpentine.config.json
 */

import { readFile } from "node:fs/promises";
import { ConfigError } from "../error.ts";
import { ErrorCode } from "../error-codes.ts";
import { getErrorMessage, isObjectValue } from "../utils.ts";
import { globalLogger as logger } from "../../logger.ts";
import { DEFAULT_CONFIG, isConfigKey, type TranspilerConfig, validateValue } from "./types.ts";

export const CONFIG_FILE_NAME = "serpentine.config.json";

/**
 * Merge user overrides over the defaults, validating every key
 */
export function resolveConfig(
  overrides: Record<string, unknown> = {},
  filePath?: string,
): TranspilerConfig {
  const config: TranspilerConfig = { ...DEFAULT_CONFIG };

  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown config key: ${key}`, {
        key,
        filePath,
        code: ErrorCode.UNKNOWN_CONFIG_KEY,
      });
    }
    const result = validateValue(key, value);
    if (!result.valid) {
      throw new ConfigError(result.error ?? `Invalid value for ${key}`, { key, filePath });
    }
    assignConfigValue(config, key, value);
  }

  return config;
}

function assignConfigValue(config: TranspilerConfig, key: keyof TranspilerConfig, value: unknown): void {
  switch (key) {
    case "indent":
    case "collectionInlineLimit":
      if (typeof value === "number") config[key] = value;
      return;
    case "runtimeHeader":
    case "functionPrefix":
      if (typeof value === "string") config[key] = value;
      return;
    case "forwardDeclarations":
    case "synthesizeMainCall":
      if (typeof value === "boolean") config[key] = value;
      return;
  }
}

// ============================================================
// File I/O
// ============================================================

/**
 * Read a JSON config file and resolve it against the defaults
 */
export async function loadConfig(path: string): Promise<TranspilerConfig> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${getErrorMessage(error)}`, {
      filePath: path,
      code: ErrorCode.CONFIG_FILE_UNREADABLE,
      originalError: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${getErrorMessage(error)}`, {
      filePath: path,
      code: ErrorCode.CONFIG_FILE_UNREADABLE,
      originalError: error instanceof Error ? error : undefined,
    });
  }

  if (!isObjectValue(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`, {
      filePath: path,
      code: ErrorCode.CONFIG_FILE_UNREADABLE,
    });
  }

  logger.debug(`Loaded config from ${path}`, "config");
  return resolveConfig(parsed, path);
}
