// src/transpiler/syntax/conditional.ts
// Module for if / elif / else chains

import { emitBlockBody, type GeneratorContext, type StatementsGenerator } from "../compiler-context.ts";
import type { Expression, If, Statement } from "../type/py_ast.ts";
import { generateCondition } from "./expression.ts";

export function generateIf(stmt: If, ctx: GeneratorContext, generateStatements: StatementsGenerator): void {
  const { buffer } = ctx;

  buffer.writeLine(`if (${generateCondition(stmt.cond, ctx)}) {`, stmt.position);
  emitBlockBody(ctx, () => generateStatements(stmt.body.statements, ctx));

  for (const clause of stmt.elifs) {
    buffer.writeLine(`} else if (${generateCondition(clause.cond, ctx)}) {`, clause.cond.position);
    emitBlockBody(ctx, () => generateStatements(clause.body.statements, ctx));
  }

  if (stmt.orelse) {
    const orelse = stmt.orelse;
    buffer.writeLine("} else {");
    emitBlockBody(ctx, () => generateStatements(orelse.statements, ctx));
  }

  buffer.writeLine("}");
}

function isNameIdentifier(expr: Expression): boolean {
  return expr.kind === "Identifier" && expr.name === "__name__";
}

function isMainString(expr: Expression): boolean {
  return expr.kind === "LiteralExpr" && expr.literalType === "str" && expr.value === "__main__";
}

/**
 * `if __name__ == "__main__":` with either operand order and no elif/else
 */
export function isMainGuard(stmt: Statement): stmt is If {
  if (stmt.kind !== "If" || stmt.elifs.length > 0 || stmt.orelse) return false;
  const cond = stmt.cond;
  if (cond.kind !== "ComparisonExpr" || cond.op !== "==") return false;
  return (isNameIdentifier(cond.left) && isMainString(cond.right)) ||
    (isMainString(cond.left) && isNameIdentifier(cond.right));
}
