import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { DEFAULT_CONFIG, loadConfig, resolveConfig, validateValue } from "../../src/common/config/index.ts";
import { ConfigError } from "../../src/common/error.ts";
import { ErrorCode } from "../../src/common/error-codes.ts";
import { py, transpile } from "./_shared/helpers.ts";

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "serpentine-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test("Config: defaults", () => {
  expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  expect(DEFAULT_CONFIG.indent).toBe(4);
  expect(DEFAULT_CONFIG.runtimeHeader).toBe("builtins.hpp");
});

test("Config: overrides are merged over defaults", () => {
  const config = resolveConfig({ indent: 2, functionPrefix: "py_" });
  expect(config.indent).toBe(2);
  expect(config.functionPrefix).toBe("py_");
  expect(config.forwardDeclarations).toBe(true);
});

test("Config: undefined overrides are skipped", () => {
  expect(resolveConfig({ indent: undefined })).toEqual(DEFAULT_CONFIG);
});

test("Config: unknown key", () => {
  expect(() => resolveConfig({ bogus: 1 })).toThrow("[SP3001] Unknown config key: bogus");
});

test("Config: invalid value", () => {
  let caught: unknown;
  try {
    resolveConfig({ indent: 0 });
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(ConfigError);
  if (!(caught instanceof ConfigError)) return;
  expect(caught.key).toBe("indent");
  expect(caught.code).toBe(ErrorCode.INVALID_CONFIG_VALUE);
  expect(caught.message).toBe("[SP3002] indent must be between 1 and 8");
});

test("Config: value validation", () => {
  expect(validateValue("indent", 0)).toEqual({ valid: false, error: "indent must be between 1 and 8" });
  expect(validateValue("indent", 2)).toEqual({ valid: true });
  expect(validateValue("runtimeHeader", "runtime.txt").valid).toBe(false);
  expect(validateValue("runtimeHeader", "runtime/dynamic.hpp").valid).toBe(true);
  expect(validateValue("functionPrefix", "9x").valid).toBe(false);
  expect(validateValue("synthesizeMainCall", "yes")).toEqual({
    valid: false,
    error: "synthesizeMainCall must be a boolean",
  });
  expect(validateValue("collectionInlineLimit", 0)).toEqual({ valid: true });
});

test("Config: indent width applies to generated code", () => {
  const lines = transpile(py("x = 1"), { config: { indent: 2 } }).split("\n");
  expect(lines[4]).toBe("  DynamicType x = DynamicType(1);");
});

test("Config: runtime header applies to generated code", () => {
  const lines = transpile(py("x = 1"), { config: { runtimeHeader: "runtime/dynamic.hpp" } }).split("\n");
  expect(lines[1]).toBe('#include "runtime/dynamic.hpp"');
});

test("Config: loadConfig reads a JSON file", async () => {
  const path = join(dir, "serpentine.config.json");
  await writeFile(path, JSON.stringify({ indent: 3, forwardDeclarations: false }), "utf8");
  const config = await loadConfig(path);
  expect(config).toEqual({ ...DEFAULT_CONFIG, indent: 3, forwardDeclarations: false });
});

test("Config: loadConfig rejects invalid JSON", async () => {
  const path = join(dir, "broken.json");
  await writeFile(path, "{ indent: ", "utf8");
  await expect(loadConfig(path)).rejects.toThrow(`Config file ${path} is not valid JSON`);
});

test("Config: loadConfig rejects a non-object", async () => {
  const path = join(dir, "list.json");
  await writeFile(path, "[1, 2]", "utf8");
  await expect(loadConfig(path)).rejects.toThrow("must contain a JSON object");
});

test("Config: loadConfig reports a missing file", async () => {
  await expect(loadConfig(join(dir, "missing.json"))).rejects.toBeInstanceOf(ConfigError);
});
