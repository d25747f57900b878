/**
 * C++ Code Generator
 *
 * Lowers a parsed Module to one C++ translation unit:
 *   includes → prototypes → function definitions → int main()
 *
 * Every value is a DynamicType from the runtime header. Top-level statements
 * run inside main(); a `__name__ == "__main__"` guard is unwrapped there.
 */

import { CodeGenError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import type { TranspilerConfig } from "../../common/config/types.ts";
import { globalLogger as logger } from "../../logger.ts";
import type { CodeBufferResult } from "../codegen/code-buffer.ts";
import { createGeneratorContext, type GeneratorContext } from "../compiler-context.ts";
import type { ScopeTracker } from "../scope_table.ts";
import { findNode, type FunctionDef, type Module, type Statement } from "../type/py_ast.ts";
import { isMainGuard } from "../syntax/conditional.ts";
import { cppFunctionName } from "../syntax/expression.ts";
import { generateFunction, generateFunctionDeclaration } from "../syntax/function.ts";
import { generateStatements } from "../syntax/statement.ts";

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Overrides merged over DEFAULT_CONFIG */
  config?: Partial<TranspilerConfig>;
  /** Source path, recorded in errors and source map mappings */
  filePath?: string;
  /** Scope tracker to reuse; it is reset before generation */
  scope?: ScopeTracker;
}

// ============================================================================
// Helpers
// ============================================================================

function partitionModule(module: Module): { functions: FunctionDef[]; statements: Statement[] } {
  const functions: FunctionDef[] = [];
  const statements: Statement[] = [];

  for (const stmt of module.body) {
    if (stmt.kind === "FunctionDef") {
      functions.push(stmt);
    } else if (isMainGuard(stmt)) {
      statements.push(...stmt.body.statements);
    } else {
      statements.push(stmt);
    }
  }

  return { functions, statements };
}

function registerFunctions(functions: FunctionDef[], ctx: GeneratorContext): void {
  for (const fn of functions) {
    if (ctx.functions.has(fn.name)) {
      throw new CodeGenError(
        `Function '${fn.name}' is defined more than once`,
        { code: ErrorCode.CODEGEN_FAILED, filePath: ctx.filePath },
        fn,
      );
    }
    ctx.functions.add(fn.name);
  }
}

function callsMain(statements: Statement[]): boolean {
  return statements.some((stmt) =>
    findNode(stmt, (node) =>
      node.kind === "CallExpr" && node.callee.kind === "Identifier" && node.callee.name === "main"
    ) !== undefined
  );
}

function generateEntryPoint(statements: Statement[], ctx: GeneratorContext): void {
  const { buffer, scope } = ctx;
  const synthesizeMain = ctx.config.synthesizeMainCall && ctx.functions.has("main") &&
    !callsMain(statements);

  buffer.writeLine("int main() {");
  scope.enterScope("module");
  try {
    buffer.withIndent(() => {
      generateStatements(statements, ctx);
      if (synthesizeMain) {
        buffer.writeLine(`${cppFunctionName("main", ctx)}();`);
      }
      buffer.writeLine("return 0;");
    });
  } finally {
    scope.exitScope();
  }
  buffer.writeLine("}");
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Generate C++ along with the line mappings collected on the way
 */
export function generateWithMappings(module: Module, options: GenerateOptions = {}): CodeBufferResult {
  const ctx = createGeneratorContext(options);
  ctx.scope.reset();

  const { functions, statements } = partitionModule(module);
  registerFunctions(functions, ctx);
  logger.debug(
    `Generating ${functions.length} functions and ${statements.length} top-level statements`,
    "codegen",
  );

  const { buffer, config } = ctx;
  buffer.writeLine("#include <cmath>");
  buffer.writeLine(`#include "${config.runtimeHeader}"`);
  buffer.writeLine();

  if (functions.length > 0 && config.forwardDeclarations) {
    for (const fn of functions) {
      generateFunctionDeclaration(fn, ctx);
    }
    buffer.writeLine();
  }

  for (const fn of functions) {
    generateFunction(fn, ctx);
    buffer.writeLine();
  }

  generateEntryPoint(statements, ctx);

  return buffer.getResult();
}

/**
 * Generate a complete C++ translation unit for a module.
 *
 * @throws {CodeGenError} for constructs with no C++ lowering
 *
 * @example
 * generate(parseSource("print(1)\n"));
 * // #include <cmath>
 * // #include "builtins.hpp"
 * //
 * // int main() {
 * //     print(DynamicType(1));
 * //     return 0;
 * // }
 */
export function generate(module: Module, options: GenerateOptions = {}): string {
  return generateWithMappings(module, options).code;
}
