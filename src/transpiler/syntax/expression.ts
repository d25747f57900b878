// src/transpiler/syntax/expression.ts
// Module for lowering expressions to C++ DynamicType expressions

import { CodeGenError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import type { GeneratorContext } from "../compiler-context.ts";
import { assertNever } from "../codegen/exhaustive.ts";
import {
  BUILTIN_FUNCTIONS,
  CPP_RESERVED_NAMES,
  isBuiltinFunction,
  isMappedMethod,
  METHOD_MAP,
  RESERVED_PREFIX,
} from "../constants/index.ts";
import {
  type Attribute,
  type BinaryExpr,
  type CallExpr,
  type ComparisonExpr,
  type Expression,
  type LiteralExpr,
  type Slice,
  type Subscript,
  type UnaryExpr,
  UnaryOp,
} from "../type/py_ast.ts";
import { escapeCppString, utf8ByteLength } from "../utils/escape-sequences.ts";
import { generateCollection } from "./data-structure.ts";

/**
 * C++ spelling of a Python variable name.
 * Names that clash with C++ keywords or runtime symbols get a prefix.
 */
export function cppIdentifier(name: string): string {
  return CPP_RESERVED_NAMES.has(name) ? `${RESERVED_PREFIX}${name}` : name;
}

/**
 * C++ spelling of a user function name
 */
export function cppFunctionName(name: string, ctx: GeneratorContext): string {
  return `${ctx.config.functionPrefix}${name}`;
}

/**
 * Integer value of an int literal, or of a negated one
 */
export function literalIntValue(expr: Expression): number | undefined {
  if (expr.kind === "LiteralExpr" && expr.literalType === "int" && typeof expr.value === "number") {
    return expr.value;
  }
  if (expr.kind === "UnaryExpr" && expr.op === UnaryOp.Neg) {
    const inner = literalIntValue(expr.operand);
    return inner === undefined ? undefined : -inner;
  }
  return undefined;
}

const INT_MAX = 2147483647;

/**
 * Reject an int literal, bare or negated, that DynamicType(int) cannot hold
 */
export function checkIntLiteral(expr: Expression, ctx: GeneratorContext): void {
  if (expr.kind === "UnaryExpr" && expr.op === UnaryOp.Neg) {
    checkIntLiteral(expr.operand, ctx);
    return;
  }
  if (expr.kind !== "LiteralExpr" || expr.literalType !== "int") return;
  if (typeof expr.value === "number" && Number.isSafeInteger(expr.value) && expr.value <= INT_MAX) return;
  throw new CodeGenError(
    `Integer literal ${expr.raw ?? String(expr.value)} does not fit in a C++ int`,
    { code: ErrorCode.INT_LITERAL_OUT_OF_RANGE, filePath: ctx.filePath },
    expr,
  );
}

function formatFloat(value: number): string {
  if (!Number.isFinite(value)) return "HUGE_VAL";
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

/**
 * std::string construction; a string holding NUL is built from its byte length
 */
function generateStringLiteral(value: string): string {
  const escaped = escapeCppString(value);
  return value.includes("\0")
    ? `std::string("${escaped}", ${utf8ByteLength(value)})`
    : `std::string("${escaped}")`;
}

function generateLiteral(expr: LiteralExpr, ctx: GeneratorContext): string {
  switch (expr.literalType) {
    case "int":
      checkIntLiteral(expr, ctx);
      return `DynamicType(${String(expr.value)})`;
    case "float":
      return `DynamicType(${formatFloat(Number(expr.value))})`;
    case "str":
      return `DynamicType(${generateStringLiteral(String(expr.value))})`;
    case "bool":
      return `DynamicType(${expr.value === true ? "true" : "false"})`;
    case "none":
      return "DynamicType()";
    default:
      return assertNever(expr.literalType);
  }
}

function generateUnary(expr: UnaryExpr, ctx: GeneratorContext): string {
  const operand = generateExpression(expr.operand, ctx);
  switch (expr.op) {
    case UnaryOp.Neg:
      return `(DynamicType(0) - (${operand}))`;
    case UnaryOp.Not:
      return `DynamicType(!(${operand}).toBool())`;
    default:
      return assertNever(expr.op);
  }
}

function generateBinary(expr: BinaryExpr, ctx: GeneratorContext): string {
  const left = generateExpression(expr.left, ctx);
  const right = generateExpression(expr.right, ctx);

  switch (expr.op) {
    case "+":
    case "-":
    case "*":
    case "/":
    case "%":
      return `((${left}) ${expr.op} (${right}))`;
    case "**":
      return `DynamicType(std::pow((${left}).toDouble(), (${right}).toDouble()))`;
    case "//":
      return `(${left}).floor_div(${right})`;
    case "and":
      return `DynamicType((${left}).toBool() && (${right}).toBool())`;
    case "or":
      return `DynamicType((${left}).toBool() || (${right}).toBool())`;
    default:
      return assertNever(expr.op);
  }
}

function generateComparison(expr: ComparisonExpr, ctx: GeneratorContext): string {
  const left = generateExpression(expr.left, ctx);
  const right = generateExpression(expr.right, ctx);

  switch (expr.op) {
    case "==":
    case "!=":
    case "<":
    case "<=":
    case ">":
    case ">=":
      return `DynamicType((${left}) ${expr.op} (${right}))`;
    // identity has no runtime counterpart; it compares by value
    case "is":
      return `DynamicType((${left}) == (${right}))`;
    case "is not":
      return `DynamicType((${left}) != (${right}))`;
    case "in":
      return `DynamicType((${right}).contains(${left}))`;
    case "not in":
      return `DynamicType(!(${right}).contains(${left}))`;
    default:
      return assertNever(expr.op);
  }
}

function generateArguments(args: readonly Expression[], ctx: GeneratorContext): string {
  return args.map((arg) => generateExpression(arg, ctx)).join(", ");
}

function generateMethodCall(callee: Attribute, expr: CallExpr, ctx: GeneratorContext): string {
  const object = generateExpression(callee.value, ctx);
  const args = expr.args;

  if (callee.attr === "pop") {
    if (args.length === 0) return `(${object}).removeAt(DynamicType(-1))`;
    if (args.length === 1) return `(${object}).removeKey(${generateExpression(args[0], ctx)})`;
  }

  if ((callee.attr === "sublist" || callee.attr === "slice") && args.length === 2) {
    return `(${object}).sublist(${generateArguments(args, ctx)})`;
  }

  const method = isMappedMethod(callee.attr) ? METHOD_MAP[callee.attr] : callee.attr;
  return `(${object}).${method}(${generateArguments(args, ctx)})`;
}

/**
 * Bare names call a builtin unless the module defines a function of that
 * name; every other bare name is a user function. Method calls go through
 * the method table. Anything else has no C++ counterpart.
 */
function generateCall(expr: CallExpr, ctx: GeneratorContext): string {
  const callee = expr.callee;

  if (callee.kind === "Attribute") {
    return generateMethodCall(callee, expr, ctx);
  }

  if (callee.kind === "Identifier") {
    const args = generateArguments(expr.args, ctx);
    if (isBuiltinFunction(callee.name) && !ctx.functions.has(callee.name)) {
      return `${BUILTIN_FUNCTIONS[callee.name]}(${args})`;
    }
    return `${cppFunctionName(callee.name, ctx)}(${args})`;
  }

  throw new CodeGenError(
    `Only named functions and methods can be called, not ${callee.kind}`,
    { code: ErrorCode.UNSUPPORTED_CALLEE, filePath: ctx.filePath },
    expr,
  );
}

function isFullSlice(slice: Slice): boolean {
  return !slice.lower && !slice.upper && (!slice.step || literalIntValue(slice.step) === 1);
}

function generateSlice(value: string, slice: Slice, ctx: GeneratorContext): string {
  if (isFullSlice(slice)) return value;

  const start = slice.lower ? generateExpression(slice.lower, ctx) : "DynamicType(0)";
  const stop = slice.upper ? generateExpression(slice.upper, ctx) : `len(${value})`;

  if (!slice.step || literalIntValue(slice.step) === 1) {
    return `(${value}).sublist(${start}, ${stop})`;
  }
  return `(${value}).sublist(${start}, ${stop}, ${generateExpression(slice.step, ctx)})`;
}

function generateSubscript(expr: Subscript, ctx: GeneratorContext): string {
  const value = generateExpression(expr.value, ctx);
  if (expr.index.kind === "Slice") {
    return generateSlice(value, expr.index, ctx);
  }
  return `(${value})[${generateExpression(expr.index, ctx)}]`;
}

/**
 * Lower an expression to a C++ expression of type DynamicType.
 *
 * @example
 * generateExpression(parseExpr("a + 1"), ctx)
 * // → "((a) + (DynamicType(1)))"
 */
export function generateExpression(expr: Expression, ctx: GeneratorContext): string {
  switch (expr.kind) {
    case "LiteralExpr":
      return generateLiteral(expr, ctx);
    case "Identifier":
      return expr.name === "__name__"
        ? `DynamicType(std::string("__main__"))`
        : cppIdentifier(expr.name);
    case "UnaryExpr":
      return generateUnary(expr, ctx);
    case "BinaryExpr":
      return generateBinary(expr, ctx);
    case "ComparisonExpr":
      return generateComparison(expr, ctx);
    case "CallExpr":
      return generateCall(expr, ctx);
    case "ListExpr":
    case "TupleExpr":
    case "SetExpr":
    case "DictExpr":
      return generateCollection(expr, ctx, generateExpression);
    case "Subscript":
      return generateSubscript(expr, ctx);
    case "Attribute":
      return `(${generateExpression(expr.value, ctx)}).${expr.attr}`;
    default:
      return assertNever(expr);
  }
}

/**
 * C++ boolean test of a condition expression
 */
export function generateCondition(expr: Expression, ctx: GeneratorContext): string {
  return `(${generateExpression(expr, ctx)}).toBool()`;
}
