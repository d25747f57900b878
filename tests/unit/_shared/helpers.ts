/**
 * Shared helpers for unit tests
 * These tests run in-process using the transpiler API directly
 */

import { createGeneratorContext, type GeneratorContext } from "../../../src/transpiler/compiler-context.ts";
import { type TranspileOptions, transpileSync } from "../../../src/transpiler/index.ts";
import { parseSource } from "../../../src/transpiler/pipeline/parser.ts";
import { generateExpression } from "../../../src/transpiler/syntax/expression.ts";
import type { Expression, Statement } from "../../../src/transpiler/type/py_ast.ts";

/**
 * Transpile Python code and return the C++ output
 */
export function transpile(code: string, options?: TranspileOptions): string {
  return transpileSync(code, options).code;
}

export function parseStatements(code: string): readonly Statement[] {
  return parseSource(code).body;
}

/**
 * Parse a single expression statement and return its expression
 */
export function parseExpression(code: string): Expression {
  const [stmt] = parseStatements(`${code}\n`);
  if (stmt?.kind !== "ExprStmt") {
    throw new Error(`Not an expression statement: ${code}`);
  }
  return stmt.expr;
}

/**
 * C++ for a single Python expression
 */
export function expr(code: string, ctx: GeneratorContext = createGeneratorContext()): string {
  return generateExpression(parseExpression(code), ctx);
}

/**
 * Lines of main()'s body, without `return 0;` and with one indent level removed
 */
export function mainBody(code: string, options?: TranspileOptions): string[] {
  const lines = transpile(code, options).split("\n");
  const start = lines.indexOf("int main() {");
  const end = lines.lastIndexOf("    return 0;");
  return lines.slice(start + 1, end).map((line) => line.replace(/^ {4}/, ""));
}

/**
 * Source text from lines, newline-terminated
 */
export function py(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}
