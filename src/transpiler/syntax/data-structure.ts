// src/transpiler/syntax/data-structure.ts
// Module for list, tuple, set and dict literals

import type { CollectionExpr, DictExpr, Expression } from "../type/py_ast.ts";
import type { GeneratorContext } from "../compiler-context.ts";
import { assertNever } from "../codegen/exhaustive.ts";

type ExpressionGenerator = (expr: Expression, ctx: GeneratorContext) => string;

const VECTOR_TYPE = "std::vector<DynamicType>";
const SET_TYPE = "std::unordered_set<DynamicType>";
const MAP_TYPE = "std::map<std::string, DynamicType>";

/**
 * Wrap initializer entries in a braced DynamicType constructor.
 *
 * Up to `collectionInlineLimit` entries stay on one line; longer literals put
 * one entry per line, indented one level relative to the opening line.
 */
function wrapEntries(containerType: string, entries: string[], ctx: GeneratorContext): string {
  if (entries.length <= ctx.config.collectionInlineLimit) {
    return `DynamicType(${containerType}{${entries.join(", ")}})`;
  }

  const indent = ctx.buffer.indentStr;
  const body = entries
    .map((entry) => indent + entry.split("\n").join(`\n${indent}`))
    .join(",\n");
  return `DynamicType(${containerType}{\n${body}\n})`;
}

function generateDict(
  dict: DictExpr,
  ctx: GeneratorContext,
  generateExpression: ExpressionGenerator,
): string {
  // the runtime's dict is keyed by string, so every key is stringified
  const entries = dict.pairs.map(({ key, value }) =>
    `{(${generateExpression(key, ctx)}).toString(), ${generateExpression(value, ctx)}}`
  );
  return wrapEntries(MAP_TYPE, entries, ctx);
}

/**
 * Generate the C++ initializer for a collection literal.
 * Tuples have no runtime counterpart and become lists.
 */
export function generateCollection(
  expr: CollectionExpr,
  ctx: GeneratorContext,
  generateExpression: ExpressionGenerator,
): string {
  switch (expr.kind) {
    case "ListExpr":
    case "TupleExpr":
      return wrapEntries(VECTOR_TYPE, expr.elements.map((el) => generateExpression(el, ctx)), ctx);
    case "SetExpr":
      return wrapEntries(SET_TYPE, expr.elements.map((el) => generateExpression(el, ctx)), ctx);
    case "DictExpr":
      return generateDict(expr, ctx, generateExpression);
    default:
      return assertNever(expr);
  }
}
