// src/transpiler/syntax/loop.ts
// Module for while and for loops, their else clauses, and break / continue

import { CodeGenError, LoopControlError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import {
  emitBlockBody,
  type GeneratorContext,
  type StatementsGenerator,
  uniqueId,
} from "../compiler-context.ts";
import type { Block, Break, CallExpr, Continue, Expression, For, While } from "../type/py_ast.ts";
import { assignTo } from "./binding.ts";
import { checkIntLiteral, generateCondition, generateExpression, literalIntValue } from "./expression.ts";

/**
 * Run `fn` with `flag` as the innermost loop's completion flag
 */
function withLoop(ctx: GeneratorContext, flag: string | null, fn: () => void): void {
  ctx.loopFlags.push(flag);
  try {
    fn();
  } finally {
    ctx.loopFlags.pop();
  }
}

function generateLoopElse(
  flag: string | null,
  orelse: Block | undefined,
  ctx: GeneratorContext,
  generateStatements: StatementsGenerator,
): void {
  if (!flag || !orelse) return;
  ctx.buffer.writeLine(`if (${flag}) {`, orelse.position);
  emitBlockBody(ctx, () => generateStatements(orelse.statements, ctx));
  ctx.buffer.writeLine("}");
}

export function generateWhile(
  stmt: While,
  ctx: GeneratorContext,
  generateStatements: StatementsGenerator,
): void {
  const flag = stmt.orelse ? `_while_completed_${uniqueId(ctx)}` : null;
  if (flag) ctx.buffer.writeLine(`bool ${flag} = true;`);

  ctx.buffer.writeLine(`while (${generateCondition(stmt.cond, ctx)}) {`, stmt.position);
  withLoop(ctx, flag, () => emitBlockBody(ctx, () => generateStatements(stmt.body.statements, ctx)));
  ctx.buffer.writeLine("}");

  generateLoopElse(flag, stmt.orelse, ctx, generateStatements);
}

function isRangeCall(expr: Expression, ctx: GeneratorContext): expr is CallExpr {
  return expr.kind === "CallExpr" && expr.callee.kind === "Identifier" &&
    expr.callee.name === "range" && !ctx.functions.has("range");
}

/**
 * Loop bound as a C++ int: literals raw, anything else through toInt()
 */
function rangeBound(expr: Expression, ctx: GeneratorContext): string {
  const literal = literalIntValue(expr);
  if (literal === undefined) return `(${generateExpression(expr, ctx)}).toInt()`;
  checkIntLiteral(expr, ctx);
  return String(literal);
}

function rangeHeader(call: CallExpr, id: number, ctx: GeneratorContext): string {
  const args = call.args;
  if (args.length < 1 || args.length > 3) {
    throw new CodeGenError(
      `range() expects 1 to 3 arguments, got ${args.length}`,
      { code: ErrorCode.INVALID_RANGE_CALL, filePath: ctx.filePath },
      call,
    );
  }

  const i = `_i_${id}`;
  const stop = `_stop_${id}`;
  const startValue = args.length >= 2 ? rangeBound(args[0], ctx) : "0";
  const stopValue = rangeBound(args.length === 1 ? args[0] : args[1], ctx);
  const init = `int ${i} = ${startValue}, ${stop} = ${stopValue}`;

  if (args.length < 3) {
    return `for (${init}; ${i} < ${stop}; ${i} += 1) {`;
  }

  const stepArg = args[2];
  const step = literalIntValue(stepArg);
  if (step === 0) {
    throw new CodeGenError(
      "range() step must not be zero",
      { code: ErrorCode.INVALID_RANGE_CALL, filePath: ctx.filePath },
      call,
    );
  }
  if (step !== undefined) {
    checkIntLiteral(stepArg, ctx);
    return `for (${init}; ${i} ${step < 0 ? ">" : "<"} ${stop}; ${i} += ${step}) {`;
  }

  // sign known only at run time
  const stepVar = `_step_${id}`;
  return `for (${init}, ${stepVar} = ${rangeBound(stepArg, ctx)}; ` +
    `(${stepVar} > 0 ? ${i} < ${stop} : ${i} > ${stop}); ${i} += ${stepVar}) {`;
}

/**
 * `for` over `range(...)` becomes a counted C++ loop; any other iterable is
 * evaluated once and walked through its list view.
 */
export function generateFor(
  stmt: For,
  ctx: GeneratorContext,
  generateStatements: StatementsGenerator,
): void {
  const { buffer } = ctx;
  const id = uniqueId(ctx);
  const flag = stmt.orelse ? `_for_completed_${id}` : null;
  if (flag) buffer.writeLine(`bool ${flag} = true;`);

  let item: string;
  if (isRangeCall(stmt.iterable, ctx)) {
    buffer.writeLine(rangeHeader(stmt.iterable, id, ctx), stmt.position);
    item = `DynamicType(_i_${id})`;
  } else {
    buffer.writeLine(`DynamicType _iter_${id} = ${generateExpression(stmt.iterable, ctx)};`, stmt.position);
    buffer.writeLine(`for (const DynamicType& _item_${id} : (_iter_${id}).getList()) {`);
    item = `_item_${id}`;
  }

  withLoop(ctx, flag, () =>
    emitBlockBody(ctx, () => {
      assignTo(stmt.target, item, ctx, stmt.target.position, "loop-target");
      generateStatements(stmt.body.statements, ctx);
    })
  );
  buffer.writeLine("}");

  generateLoopElse(flag, stmt.orelse, ctx, generateStatements);
}

export function generateBreak(stmt: Break, ctx: GeneratorContext): void {
  if (ctx.loopFlags.length === 0) {
    throw new LoopControlError("break", stmt, ctx.filePath);
  }
  const flag = ctx.loopFlags[ctx.loopFlags.length - 1];
  if (flag) ctx.buffer.writeLine(`${flag} = false;`);
  ctx.buffer.writeLine("break;", stmt.position);
}

export function generateContinue(stmt: Continue, ctx: GeneratorContext): void {
  if (ctx.loopFlags.length === 0) {
    throw new LoopControlError("continue", stmt, ctx.filePath);
  }
  ctx.buffer.writeLine("continue;", stmt.position);
}
