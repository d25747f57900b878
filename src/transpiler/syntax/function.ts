// src/transpiler/syntax/function.ts
// Module for top-level function definitions and their prototypes

import { CodeGenError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import { globalLogger as logger } from "../../logger.ts";
import type { GeneratorContext } from "../compiler-context.ts";
import type { FunctionDef } from "../type/py_ast.ts";
import { cppFunctionName, cppIdentifier } from "./expression.ts";
import { generateStatements } from "./statement.ts";

function checkParameters(fn: FunctionDef, ctx: GeneratorContext): void {
  const seen = new Set<string>();
  for (const param of fn.params) {
    if (seen.has(param.name)) {
      throw new CodeGenError(
        `Duplicate parameter '${param.name}' in function '${fn.name}'`,
        { code: ErrorCode.DUPLICATE_PARAMETER, filePath: ctx.filePath },
        param.position ? param : fn,
      );
    }
    seen.add(param.name);
  }
}

export function generateFunctionSignature(fn: FunctionDef, ctx: GeneratorContext): string {
  const params = fn.params.map((param) => `DynamicType ${cppIdentifier(param.name)}`).join(", ");
  return `DynamicType ${cppFunctionName(fn.name, ctx)}(${params})`;
}

/**
 * Prototype line, so that definition order does not matter to the C++ compiler
 */
export function generateFunctionDeclaration(fn: FunctionDef, ctx: GeneratorContext): void {
  ctx.buffer.writeLine(`${generateFunctionSignature(fn, ctx)};`);
}

/**
 * Emit a full definition. Parameters live in a fresh function scope, and a
 * body without a top-level return falls through to `return DynamicType();`.
 */
export function generateFunction(fn: FunctionDef, ctx: GeneratorContext): void {
  checkParameters(fn, ctx);
  logger.debug(`Generating function '${fn.name}' (${fn.params.length} params)`, "codegen");

  ctx.buffer.writeLine(`${generateFunctionSignature(fn, ctx)} {`, fn.position, fn.name);
  ctx.scope.enterScope("function");
  ctx.functionDepth++;
  try {
    ctx.buffer.withIndent(() => {
      for (const param of fn.params) {
        ctx.scope.declare(param.name, "parameter");
      }
      generateStatements(fn.body, ctx);
      if (!fn.body.some((stmt) => stmt.kind === "Return")) {
        ctx.buffer.writeLine("return DynamicType();");
      }
    });
  } finally {
    ctx.functionDepth--;
    ctx.scope.exitScope();
  }
  ctx.buffer.writeLine("}");
}
