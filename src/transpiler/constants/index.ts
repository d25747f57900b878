// src/transpiler/constants/index.ts
// Name tables shared by the generators

import reserved from "./cpp-reserved.json";

/**
 * Python builtins callable from transpiled code, mapped to the runtime's
 * C++ function names. Names that collide with C++ keywords or std symbols
 * carry a trailing underscore in the runtime header.
 */
export const BUILTIN_FUNCTIONS: Readonly<Record<string, string>> = {
  print: "print",
  len: "len",
  range: "range",
  str: "str",
  int: "int_",
  float: "float_",
  bool: "bool_",
  abs: "abs_",
  min: "min_",
  max: "max_",
  sum: "sum_",
  type: "type_",
  input: "input_",
  set: "set_",
};

/**
 * Python methods renamed to their DynamicType member. `pop`, `sublist`
 * and `slice` are rewritten by arity in the expression generator.
 */
export const METHOD_MAP: Readonly<Record<string, string>> = {
  append: "append",
  remove: "remove",
  get: "get",
  add: "add",
  discard: "remove",
};

export const RESERVED_PREFIX = "_v_";

/** Names a transpiled variable may not take verbatim */
export const CPP_RESERVED_NAMES: ReadonlySet<string> = new Set([
  ...reserved.keywords,
  ...reserved.runtimeSymbols,
]);

export function isBuiltinFunction(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(BUILTIN_FUNCTIONS, name);
}

export function isMappedMethod(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(METHOD_MAP, name);
}
