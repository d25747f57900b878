/**
 * Transpiler Config Types
 * Configuration interface, defaults, and validation
 */

// ============================================================
// Config Interface
// ============================================================

export interface TranspilerConfig {
  indent: number;                 // spaces per indentation level in generated C++
  runtimeHeader: string;          // header included after <cmath>
  functionPrefix: string;         // prefix applied to user function names
  forwardDeclarations: boolean;   // emit prototypes before function definitions
  collectionInlineLimit: number;  // collections up to this size stay on one line
  synthesizeMainCall: boolean;    // call a defined-but-uncalled main() from the entry point
}

// ============================================================
// Defaults
// ============================================================

export const DEFAULT_CONFIG: TranspilerConfig = {
  indent: 4,
  runtimeHeader: "builtins.hpp",
  functionPrefix: "_fn_",
  forwardDeclarations: true,
  collectionInlineLimit: 3,
  synthesizeMainCall: true,
};

// ============================================================
// Config Keys
// ============================================================

export const CONFIG_KEYS = [
  "indent",
  "runtimeHeader",
  "functionPrefix",
  "forwardDeclarations",
  "collectionInlineLimit",
  "synthesizeMainCall",
] as const;
export type ConfigKey = typeof CONFIG_KEYS[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

// ============================================================
// Validation
// ============================================================

const IDENTIFIER_PREFIX_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const HEADER_REGEX = /^[\w./-]+\.(h|hh|hpp|hxx)$/;

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

/**
 * Validate a config value for a given key
 */
export function validateValue(key: ConfigKey, value: unknown): ValidationResult {
  switch (key) {
    case "indent":
      if (typeof value !== "number" || !Number.isInteger(value)) {
        return { valid: false, error: "indent must be an integer" };
      }
      if (value < 1 || value > 8) {
        return { valid: false, error: "indent must be between 1 and 8" };
      }
      return { valid: true };

    case "runtimeHeader":
      if (typeof value !== "string") {
        return { valid: false, error: "runtimeHeader must be a string" };
      }
      if (!HEADER_REGEX.test(value)) {
        return { valid: false, error: "runtimeHeader must be a header file name such as builtins.hpp" };
      }
      return { valid: true };

    case "functionPrefix":
      if (typeof value !== "string") {
        return { valid: false, error: "functionPrefix must be a string" };
      }
      if (!IDENTIFIER_PREFIX_REGEX.test(value)) {
        return { valid: false, error: "functionPrefix must start a valid C++ identifier" };
      }
      return { valid: true };

    case "collectionInlineLimit":
      if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
        return { valid: false, error: "collectionInlineLimit must be a non-negative integer" };
      }
      return { valid: true };

    case "forwardDeclarations":
    case "synthesizeMainCall":
      if (typeof value !== "boolean") {
        return { valid: false, error: `${key} must be a boolean` };
      }
      return { valid: true };
  }
}
