import { afterEach, expect, test, vi } from "vitest";
import { Logger } from "../../src/logger.ts";

afterEach(() => {
  Logger.setAllowedNamespaces([]);
  vi.restoreAllMocks();
});

test("Logger: silent by default", () => {
  const spy = vi.spyOn(console, "log").mockImplementation(() => {});
  new Logger().debug("hidden", "codegen");
  expect(spy).not.toHaveBeenCalled();
});

test("Logger: namespaces and wildcards", () => {
  Logger.setAllowedNamespaces(["codegen", "pars*"]);
  const logger = new Logger();
  expect(logger.isNamespaceEnabled("codegen")).toBe(true);
  expect(logger.isNamespaceEnabled("parser")).toBe(true);
  expect(logger.isNamespaceEnabled("scope")).toBe(false);
  expect(logger.isNamespaceEnabled()).toBe(false);
});

test("Logger: enabled logger prefixes the namespace", () => {
  const spy = vi.spyOn(console, "log").mockImplementation(() => {});
  new Logger(true).debug("Entered block scope", "scope");
  expect(spy).toHaveBeenCalledWith("[scope] Entered block scope");
});

test("Logger: timings are measured per context", () => {
  const logger = new Logger();
  logger.startTiming("ctx", "Parse");
  expect(logger.endTiming("ctx", "Parse")).toBeGreaterThanOrEqual(0);
  expect(logger.endTiming("other", "Parse")).toBe(0);
});

test("Logger: warnings always print", () => {
  const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
  new Logger().warn("careful", "cli");
  expect(spy).toHaveBeenCalledWith("warning: [cli] careful");
});

test("Logger: measure returns the result and closes its timing", () => {
  const logger = new Logger();
  expect(logger.measure("ctx", "Parse", () => 42)).toBe(42);
  expect(logger.openTimings("ctx")).toEqual([]);
});

test("Logger: measure closes its timing when the phase throws", () => {
  const logger = new Logger();
  expect(() =>
    logger.measure("ctx", "Generate", () => {
      throw new Error("boom");
    })
  ).toThrow("boom");
  expect(logger.openTimings("ctx")).toEqual([]);
});

test("Logger: unfinished timings are listed", () => {
  const logger = new Logger();
  logger.startTiming("ctx", "Parse");
  expect(logger.openTimings("ctx")).toEqual(["Parse"]);
  expect(logger.openTimings("unknown")).toEqual([]);
});

test("Logger: performance table prints when timing is on", () => {
  const spy = vi.spyOn(console, "log").mockImplementation(() => {});
  const logger = new Logger();
  logger.measure("ctx", "Parse", () => undefined);
  logger.logPerformance("ctx", "demo.py");
  expect(spy).not.toHaveBeenCalled();

  logger.setTimingOptions({ showTiming: true });
  logger.logPerformance("ctx", "demo.py");
  expect(spy).toHaveBeenCalledTimes(1);
  const rows = String(spy.mock.calls[0][0]).split("\n");
  expect(rows[0]).toBe("=== Performance Metrics: ctx ===");
  expect(rows[1]).toBe("demo.py");
  expect(rows[2].startsWith("  Parse")).toBe(true);
  expect(rows[rows.length - 1]).toBe("=========================");
});
