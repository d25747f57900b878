// src/transpiler/syntax/statement.ts
// Statement dispatch for function bodies and the entry point

import { CodeGenError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import type { GeneratorContext } from "../compiler-context.ts";
import { assertNever } from "../codegen/exhaustive.ts";
import type { Return, Statement } from "../type/py_ast.ts";
import { generateAssign, hoistBlockDeclarations } from "./binding.ts";
import { generateIf } from "./conditional.ts";
import { generateExpression } from "./expression.ts";
import { generateBreak, generateContinue, generateFor, generateWhile } from "./loop.ts";

function generateReturn(stmt: Return, ctx: GeneratorContext): void {
  if (ctx.functionDepth === 0) {
    throw new CodeGenError(
      "'return' outside function",
      { code: ErrorCode.RETURN_OUTSIDE_FUNCTION, filePath: ctx.filePath },
      stmt,
    );
  }
  const value = stmt.value ? generateExpression(stmt.value, ctx) : "DynamicType()";
  ctx.buffer.writeLine(`return ${value};`, stmt.position);
}

export function generateStatement(stmt: Statement, ctx: GeneratorContext): void {
  switch (stmt.kind) {
    case "Assign":
      generateAssign(stmt, ctx);
      return;
    case "ExprStmt":
      ctx.buffer.writeLine(`${generateExpression(stmt.expr, ctx)};`, stmt.position);
      return;
    case "Return":
      generateReturn(stmt, ctx);
      return;
    case "Break":
      generateBreak(stmt, ctx);
      return;
    case "Continue":
      generateContinue(stmt, ctx);
      return;
    case "Pass":
      ctx.buffer.writeLine("// pass", stmt.position);
      return;
    case "Import":
      ctx.buffer.writeLine(`// import ${stmt.names.join(", ")}`, stmt.position);
      return;
    case "Block":
      generateStatements(stmt.statements, ctx);
      return;
    case "If":
      hoistBlockDeclarations(stmt, ctx);
      generateIf(stmt, ctx, generateStatements);
      return;
    case "While":
      hoistBlockDeclarations(stmt, ctx);
      generateWhile(stmt, ctx, generateStatements);
      return;
    case "For":
      hoistBlockDeclarations(stmt, ctx);
      generateFor(stmt, ctx, generateStatements);
      return;
    case "FunctionDef":
      throw new CodeGenError(
        ctx.functionDepth > 0
          ? `Nested function '${stmt.name}' is not supported`
          : `Function '${stmt.name}' must be defined at module level`,
        { code: ErrorCode.NESTED_FUNCTION, filePath: ctx.filePath },
        stmt,
      );
    default:
      assertNever(stmt);
  }
}

export function generateStatements(statements: readonly Statement[], ctx: GeneratorContext): void {
  for (const stmt of statements) {
    generateStatement(stmt, ctx);
  }
}
