// src/transpiler/syntax/binding.ts
// Module for assignments: declarations, reassignments, unpacking and augmented forms

import { CodeGenError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import { type GeneratorContext, uniqueId } from "../compiler-context.ts";
import type { Assign, AssignTarget, Block, Expression, For, If, Position, Statement, While } from "../type/py_ast.ts";
import type { DeclarationKind } from "../scope_table.ts";
import { cppIdentifier, generateExpression } from "./expression.ts";

/**
 * Store an already generated C++ value into a target.
 *
 * The first store to a name in scope declares it; later stores reassign.
 * Tuple and list patterns go through a temporary and are indexed element by element.
 */
export function assignTo(
  target: AssignTarget,
  value: string,
  ctx: GeneratorContext,
  position?: Position,
  kind: DeclarationKind = "variable",
): void {
  switch (target.kind) {
    case "Identifier": {
      const name = cppIdentifier(target.name);
      if (ctx.scope.exists(target.name)) {
        ctx.buffer.writeLine(`${name} = ${value};`, position);
      } else {
        ctx.buffer.writeLine(`DynamicType ${name} = ${value};`, position, target.name);
        ctx.scope.declare(target.name, kind);
      }
      return;
    }

    case "Subscript":
    case "Attribute":
      ctx.buffer.writeLine(`${generateExpression(target, ctx)} = ${value};`, position);
      return;

    case "TupleExpr":
    case "ListExpr": {
      const temp = `_unpack_${uniqueId(ctx)}`;
      ctx.buffer.writeLine(`DynamicType ${temp} = ${value};`, position);
      target.elements.forEach((element, index) => {
        if (
          element.kind !== "Identifier" && element.kind !== "Subscript" &&
          element.kind !== "Attribute" && element.kind !== "TupleExpr" && element.kind !== "ListExpr"
        ) {
          throw new CodeGenError(
            `Cannot unpack into ${element.kind}`,
            { code: ErrorCode.INVALID_ASSIGNMENT, filePath: ctx.filePath },
            element,
          );
        }
        assignTo(element, `(${temp})[DynamicType(${index})]`, ctx, position, kind);
      });
      return;
    }
  }
}

function augmentedValue(op: Assign["op"], current: string, value: string): string {
  switch (op) {
    case "//=":
      return `(${current}).floor_div(${value})`;
    case "**=":
      return `(${current}).pow(${value})`;
    default:
      return `(${current}) ${op.slice(0, -1)} (${value})`;
  }
}

function generateAugmentedAssign(stmt: Assign, ctx: GeneratorContext): void {
  const target = stmt.target;

  if (target.kind === "TupleExpr" || target.kind === "ListExpr") {
    throw new CodeGenError(
      `Augmented assignment '${stmt.op}' cannot target a ${target.kind === "TupleExpr" ? "tuple" : "list"} pattern`,
      { code: ErrorCode.INVALID_ASSIGNMENT, filePath: ctx.filePath },
      stmt,
    );
  }

  if (target.kind === "Identifier" && !ctx.scope.exists(target.name)) {
    throw new CodeGenError(
      `Augmented assignment '${stmt.op}' to undeclared variable '${target.name}'`,
      { code: ErrorCode.UNDECLARED_VARIABLE, filePath: ctx.filePath },
      stmt,
    );
  }

  const current = generateExpression(target, ctx);
  const value = generateExpression(stmt.value, ctx);
  ctx.buffer.writeLine(`${current} = ${augmentedValue(stmt.op, current, value)};`, stmt.position);
}

export function generateAssign(stmt: Assign, ctx: GeneratorContext): void {
  if (stmt.op !== "=") {
    generateAugmentedAssign(stmt, ctx);
    return;
  }
  assignTo(stmt.target, generateExpression(stmt.value, ctx), ctx, stmt.position);
}

function collectTargetNames(target: Expression, kind: DeclarationKind, names: Map<string, DeclarationKind>): void {
  if (target.kind === "Identifier") {
    if (!names.has(target.name)) names.set(target.name, kind);
  } else if (target.kind === "TupleExpr" || target.kind === "ListExpr") {
    for (const element of target.elements) collectTargetNames(element, kind, names);
  }
}

function collectBlockNames(block: Block | undefined, names: Map<string, DeclarationKind>): void {
  for (const stmt of block?.statements ?? []) collectBoundNames(stmt, names);
}

function collectBoundNames(stmt: Statement, names: Map<string, DeclarationKind>): void {
  switch (stmt.kind) {
    case "Assign":
      if (stmt.op === "=") collectTargetNames(stmt.target, "variable", names);
      return;
    case "Block":
      collectBlockNames(stmt, names);
      return;
    case "If":
      collectBlockNames(stmt.body, names);
      for (const clause of stmt.elifs) collectBlockNames(clause.body, names);
      collectBlockNames(stmt.orelse, names);
      return;
    case "While":
      collectBlockNames(stmt.body, names);
      collectBlockNames(stmt.orelse, names);
      return;
    case "For":
      collectTargetNames(stmt.target, "loop-target", names);
      collectBlockNames(stmt.body, names);
      collectBlockNames(stmt.orelse, names);
      return;
    default:
      return;
  }
}

/**
 * Declare, ahead of an if or loop, every name first bound inside it.
 * A name bound in a branch or loop body stays visible after the statement,
 * so it cannot be declared inside the C++ block.
 */
export function hoistBlockDeclarations(stmt: If | While | For, ctx: GeneratorContext): void {
  const names = new Map<string, DeclarationKind>();
  collectBoundNames(stmt, names);
  for (const [name, kind] of names) {
    if (ctx.scope.exists(name)) continue;
    ctx.buffer.writeLine(`DynamicType ${cppIdentifier(name)};`, stmt.position, name);
    ctx.scope.declare(name, kind);
  }
}
