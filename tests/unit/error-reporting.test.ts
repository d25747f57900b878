import { expect, test, vi } from "vitest";
import {
  CodeGenError,
  ErrorReporter,
  formatError,
  ParseError,
  TranspilerError,
} from "../../src/common/error.ts";
import { ErrorCode, getErrorDescription } from "../../src/common/error-codes.ts";
import { globalLogger } from "../../src/logger.ts";
import { transpileSync } from "../../src/transpiler/index.ts";

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

test("Errors: parse errors carry code and location in the message", () => {
  const error = new ParseError("Unexpected ')'", { line: 3, column: 7 });
  expect(error.message).toBe("[SP1003] Unexpected ')' at line 3:7");
  expect(error.code).toBe(ErrorCode.UNEXPECTED_TOKEN);
});

test("Errors: file path replaces the bare line", () => {
  const error = new ParseError("Unterminated string literal", { line: 2, column: 1, filePath: "demo.py" });
  expect(error.message).toBe("[SP1002] Unterminated string literal at demo.py:2:1");
});

test("Errors: codegen errors take the node position", () => {
  const error = new CodeGenError("Unsupported node", "Lambda", undefined);
  expect(error.code).toBe(ErrorCode.UNSUPPORTED_NODE);
  const positioned = new CodeGenError("Oops", {}, { kind: "Assign", position: { line: 4, column: 2 } });
  expect(positioned.message).toBe("[SP6099] Oops at line 4:2");
  expect(positioned.nodeType).toBe("Assign");
});

test("Errors: help text comes from the code table", () => {
  const error = new ParseError("Unexpected character '$'", { line: 1, column: 1 });
  expect(error.getHelpText()).toBe(getErrorDescription(ErrorCode.INVALID_CHARACTER));
});

test("Errors: formatted report shows the offending column", () => {
  const error = capture(() => transpileSync("x = $\n"));
  expect(error).toBeInstanceOf(TranspilerError);
  expect(formatError(error, { color: false }).split("\n")).toEqual([
    "error[SP1007]: Unexpected character '$'",
    "",
    " 1 | x = $",
    "        ^",
    " 2 | ",
    "",
    "Where: line 1:5",
    "Suggestion: Remove the character or place it inside a string",
  ]);
});

test("Errors: summary names the file", () => {
  const error = capture(() => transpileSync("break\n", { filePath: "/tmp/project/loop.py" }));
  expect(error).toBeInstanceOf(CodeGenError);
  if (!(error instanceof CodeGenError)) return;
  expect(error.getSummary()).toBe(
    "Code Generation Error: [SP6003] 'break' outside loop at /tmp/project/loop.py:1:1 (loop.py:1:1)",
  );
});

test("Errors: non-transpiler errors are formatted plainly", () => {
  expect(formatError(new Error("disk full"), { color: false })).toBe("Error: disk full");
});

test("Errors: reporter prints an error once", () => {
  const spy = vi.spyOn(console, "error").mockImplementation(() => {});
  try {
    const reporter = new ErrorReporter();
    const error = new Error("once");
    reporter.reportError(error, { color: false });
    reporter.reportError(error, { color: false });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("Error: once");
  } finally {
    spy.mockRestore();
  }
});

test("Errors: debug output lists common causes", () => {
  const error = new ParseError("Unexpected character '$'", { line: 1, column: 1 });
  const lines = formatError(error, { color: false, debug: true }).split("\n");
  expect(lines).toContain("Common causes: Stray symbol such as '$' or '?'");
});

test("Errors: a failed transpile leaves no timing open", () => {
  capture(() => transpileSync("break\n", { filePath: "/tmp/project/timing.py" }));
  capture(() => transpileSync("x = (\n", { filePath: "/tmp/project/timing.py" }));
  expect(globalLogger.openTimings("transpile:/tmp/project/timing.py")).toEqual([]);
});
