// src/transpiler/pipeline/parser.ts

import { ParseError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import { pluralize } from "../../common/utils.ts";
import { globalLogger as logger } from "../../logger.ts";
import {
  type AssignOperator,
  type AssignTarget,
  type BinaryOperator,
  type Block,
  type ComparisonOperator,
  createAssign,
  createAttribute,
  createBlock,
  createBool,
  createBreak,
  createCall,
  createComparison,
  createContinue,
  createDict,
  createExprStmt,
  createFloat,
  createFor,
  createFunctionDef,
  createIdentifier,
  createIf,
  createImport,
  createInt,
  createList,
  createModule,
  createNone,
  createPass,
  createReturn,
  createSet,
  createSlice,
  createString,
  createSubscript,
  createTuple,
  createUnary,
  createWhile,
  createBinary,
  type DictEntry,
  type ElifClause,
  type Expression,
  type Identifier,
  type Module,
  type Position,
  type Slice,
  type Statement,
  UnaryOp,
} from "../type/py_ast.ts";
import { createTokenStream, type Token, type TokenStream, TokenType } from "../tokenizer/tokenizer.ts";

interface ParserState {
  stream: TokenStream;
  source?: string;
  filePath?: string;
}

const AUGMENTED_OPERATORS: ReadonlySet<string> = new Set([
  "+=", "-=", "*=", "/=", "//=", "%=", "**=",
]);

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(["==", "!=", "<", "<=", ">", ">="]);

const UNSUPPORTED_STATEMENTS: ReadonlySet<string> = new Set([
  "class", "try", "except", "finally", "with", "raise", "assert", "del",
  "global", "nonlocal", "yield", "lambda", "async", "await",
]);

/**
 * Parse a token stream into a Module.
 *
 * The grammar is the supported Python subset: assignments (plain, chained,
 * augmented and destructuring), expression statements, return, break,
 * continue, pass, import, if/elif/else, while/else, for/else and def.
 *
 * @throws {ParseError} on the first token that does not fit the grammar
 *
 * @example
 * const module = parse(createTokenStream("x = 1\nprint(x)\n"));
 * // → Module([Assign(x, "=", 1), ExprStmt(Call(print, [x]))])
 */
export function parse(stream: TokenStream): Module {
  const state: ParserState = { stream, source: stream.source, filePath: stream.filePath };
  const body: Statement[] = [];

  while (peek(state).type !== TokenType.EOF) {
    const token = peek(state);
    if (token.type === TokenType.Newline) {
      next(state);
      continue;
    }
    if (token.type === TokenType.Indent) {
      throw error(state, "Unexpected indent", token, ErrorCode.INCONSISTENT_INDENTATION);
    }
    body.push(...parseStatement(state));
  }

  logger.debug(`Parsed module with ${pluralize(body.length, "top-level statement")}`, "parser");
  return createModule(body);
}

/**
 * Tokenize and parse source text in one step
 */
export function parseSource(source: string, filePath?: string): Module {
  return parse(createTokenStream(source, filePath));
}

// ============================================================================
// Token helpers
// ============================================================================

function peek(state: ParserState, offset = 0): Token {
  return state.stream.peek(offset);
}

function next(state: ParserState): Token {
  return state.stream.next();
}

function isOp(token: Token, value: string): boolean {
  return token.type === TokenType.Operator && token.value === value;
}

function isKeyword(token: Token, value: string): boolean {
  return token.type === TokenType.Keyword && token.value === value;
}

function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.Newline:
      return "end of line";
    case TokenType.EOF:
      return "end of input";
    case TokenType.Indent:
      return "indent";
    case TokenType.Dedent:
      return "dedent";
    case TokenType.String:
      return "string literal";
    default:
      return `'${token.value}'`;
  }
}

function error(state: ParserState, message: string, token: Token, code?: ErrorCode): ParseError {
  return new ParseError(message, {
    line: token.position.line,
    column: token.position.column,
    filePath: state.filePath,
    source: state.source,
    code,
  });
}

function unexpected(state: ParserState, token: Token): ParseError {
  return error(
    state,
    `Unexpected ${describeToken(token)}`,
    token,
    token.type === TokenType.EOF ? ErrorCode.UNEXPECTED_EOF : ErrorCode.UNEXPECTED_TOKEN,
  );
}

function expectOp(state: ParserState, value: string, context?: string): Token {
  const token = peek(state);
  if (!isOp(token, value)) {
    const where = context ? ` ${context}` : "";
    throw error(
      state,
      `Expected '${value}'${where} but found ${describeToken(token)}`,
      token,
      token.type === TokenType.EOF ? ErrorCode.UNEXPECTED_EOF : ErrorCode.UNEXPECTED_TOKEN,
    );
  }
  return next(state);
}

function expectName(state: ParserState, context: string): Token {
  const token = peek(state);
  if (token.type !== TokenType.Name) {
    throw error(state, `Expected a name ${context} but found ${describeToken(token)}`, token);
  }
  return next(state);
}

function expectStatementEnd(state: ParserState): void {
  const token = peek(state);
  if (token.type === TokenType.Newline) {
    next(state);
    return;
  }
  if (token.type === TokenType.EOF || token.type === TokenType.Dedent) return;
  if (isKeyword(token, "if")) {
    throw error(state, "Conditional expressions are not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
  }
  throw error(
    state,
    `Expected end of statement but found ${describeToken(token)}`,
    token,
    ErrorCode.UNEXPECTED_TOKEN,
  );
}

// ============================================================================
// Statements
// ============================================================================

function parseStatement(state: ParserState): Statement[] {
  const token = peek(state);

  if (token.type === TokenType.Keyword) {
    switch (token.value) {
      case "if":
        return [parseIf(state)];
      case "while":
        return [parseWhile(state)];
      case "for":
        return [parseFor(state)];
      case "def":
        return [parseFunctionDef(state)];
      case "elif":
      case "else":
        throw error(state, `'${token.value}' without a matching 'if'`, token, ErrorCode.UNEXPECTED_TOKEN);
    }
  }

  return parseSimpleStatements(state);
}

/**
 * One or more small statements separated by ';' and ending the line
 */
function parseSimpleStatements(state: ParserState): Statement[] {
  const statements: Statement[] = [...parseSmallStatement(state)];

  while (isOp(peek(state), ";")) {
    next(state);
    const token = peek(state);
    if (token.type === TokenType.Newline || token.type === TokenType.EOF) break;
    statements.push(...parseSmallStatement(state));
  }

  expectStatementEnd(state);
  return statements;
}

function parseSmallStatement(state: ParserState): Statement[] {
  const token = peek(state);
  const position = token.position;

  if (token.type === TokenType.Keyword) {
    switch (token.value) {
      case "pass":
        next(state);
        return [createPass(position)];
      case "break":
        next(state);
        return [createBreak(position)];
      case "continue":
        next(state);
        return [createContinue(position)];
      case "return":
        return [parseReturn(state)];
      case "import":
      case "from":
        return [parseImport(state)];
    }
    if (UNSUPPORTED_STATEMENTS.has(token.value)) {
      throw error(state, `'${token.value}' is not supported`, token, ErrorCode.UNSUPPORTED_SYNTAX);
    }
  }

  return parseExpressionOrAssignment(state);
}

function parseReturn(state: ParserState): Statement {
  const keyword = next(state);
  const token = peek(state);
  if (token.type === TokenType.Newline || token.type === TokenType.EOF || isOp(token, ";")) {
    return createReturn(undefined, keyword.position);
  }
  return createReturn(parseExpressionList(state), keyword.position);
}

function parseDottedName(state: ParserState): string {
  const parts = [expectName(state, "in import").value];
  while (isOp(peek(state), ".")) {
    next(state);
    parts.push(expectName(state, "in import").value);
  }
  return parts.join(".");
}

/**
 * `import a.b as c, d` and `from a import b`; both become the Import no-op
 */
function parseImport(state: ParserState): Statement {
  const keyword = next(state);
  const names: string[] = [];

  if (keyword.value === "import") {
    do {
      if (names.length > 0) next(state);
      let name = parseDottedName(state);
      if (isKeyword(peek(state), "as")) {
        next(state);
        name += ` as ${expectName(state, "after 'as'").value}`;
      }
      names.push(name);
    } while (isOp(peek(state), ","));
    return createImport(names, keyword.position);
  }

  while (isOp(peek(state), ".")) next(state);
  const moduleName = parseDottedName(state);
  const importToken = peek(state);
  if (!isKeyword(importToken, "import")) {
    throw error(state, `Expected 'import' but found ${describeToken(importToken)}`, importToken);
  }
  next(state);

  // the imported names are irrelevant to the no-op, but must be well formed
  const parenthesized = isOp(peek(state), "(");
  if (parenthesized) next(state);
  if (isOp(peek(state), "*")) {
    next(state);
  } else {
    do {
      if (isOp(peek(state), ",")) next(state);
      if (parenthesized && isOp(peek(state), ")")) break;
      expectName(state, "in import");
      if (isKeyword(peek(state), "as")) {
        next(state);
        expectName(state, "after 'as'");
      }
    } while (isOp(peek(state), ","));
  }
  if (parenthesized) expectOp(state, ")", "to close the import list");

  return createImport([moduleName], keyword.position);
}

function parseExpressionOrAssignment(state: ParserState): Statement[] {
  const startToken = peek(state);
  const first = parseExpressionList(state);
  const opToken = peek(state);

  if (isOp(opToken, "=")) {
    const targets: AssignTarget[] = [toAssignTarget(state, first, startToken)];
    let value: Expression = first;
    while (isOp(peek(state), "=")) {
      next(state);
      const valueToken = peek(state);
      value = parseExpressionList(state);
      if (isOp(peek(state), "=")) {
        targets.push(toAssignTarget(state, value, valueToken));
      }
    }
    return desugarChainedAssignment(state, targets, value, startToken);
  }

  if (opToken.type === TokenType.Operator && AUGMENTED_OPERATORS.has(opToken.value)) {
    if (first.kind !== "Identifier" && first.kind !== "Subscript" && first.kind !== "Attribute") {
      throw error(
        state,
        `Cannot assign to ${describeExpression(first)} with augmented assignment`,
        startToken,
        ErrorCode.INVALID_ASSIGNMENT_TARGET,
      );
    }
    next(state);
    const value = parseExpressionList(state);
    return [createAssign(first, toAugmentedOperator(opToken.value), value, startToken.position)];
  }

  return [createExprStmt(first, startToken.position)];
}

function toAugmentedOperator(value: string): AssignOperator {
  switch (value) {
    case "+=":
    case "-=":
    case "*=":
    case "/=":
    case "//=":
    case "%=":
    case "**=":
      return value;
    default:
      return "=";
  }
}

/**
 * `a = b = v` becomes `b = v` followed by `a = b`.
 * The value is stored into the rightmost simple target, and every other
 * target reads it back from there.
 */
function desugarChainedAssignment(
  state: ParserState,
  targets: AssignTarget[],
  value: Expression,
  startToken: Token,
): Statement[] {
  const position = startToken.position;
  if (targets.length === 1) {
    return [createAssign(targets[0], "=", value, position)];
  }

  let primaryIndex = -1;
  for (let i = targets.length - 1; i >= 0; i--) {
    const kind = targets[i].kind;
    if (kind === "Identifier" || kind === "Subscript" || kind === "Attribute") {
      primaryIndex = i;
      break;
    }
  }
  if (primaryIndex < 0) {
    throw error(
      state,
      "Chained assignment between unpacking patterns is not supported",
      startToken,
      ErrorCode.UNSUPPORTED_SYNTAX,
    );
  }

  const primary = targets[primaryIndex];
  if (primary.kind === "TupleExpr" || primary.kind === "ListExpr") {
    throw error(state, "Invalid chained assignment", startToken);
  }

  const statements: Statement[] = [createAssign(primary, "=", value, position)];
  targets.forEach((target, index) => {
    if (index !== primaryIndex) {
      statements.push(createAssign(target, "=", primary, position));
    }
  });
  return statements;
}

function describeExpression(expr: Expression): string {
  switch (expr.kind) {
    case "LiteralExpr":
      return "literal";
    case "CallExpr":
      return "function call";
    case "TupleExpr":
      return "tuple";
    case "ListExpr":
      return "list";
    case "SetExpr":
      return "set display";
    case "DictExpr":
      return "dict literal";
    case "ComparisonExpr":
      return "comparison";
    case "BinaryExpr":
    case "UnaryExpr":
      return "expression";
    default:
      return expr.kind;
  }
}

function toAssignTarget(state: ParserState, expr: Expression, token: Token): AssignTarget {
  switch (expr.kind) {
    case "Identifier":
    case "Subscript":
    case "Attribute":
      return expr;
    case "TupleExpr":
    case "ListExpr":
      for (const element of expr.elements) {
        toAssignTarget(state, element, token);
      }
      return expr;
    default:
      throw error(
        state,
        `Cannot assign to ${describeExpression(expr)}`,
        expr.position ? { ...token, position: expr.position } : token,
        ErrorCode.INVALID_ASSIGNMENT_TARGET,
      );
  }
}

// ============================================================================
// Compound statements
// ============================================================================

function parseSuite(state: ParserState, header: string): Block {
  expectOp(state, ":", `after '${header}' header`);
  const first = peek(state);

  if (first.type !== TokenType.Newline) {
    return createBlock(parseSimpleStatements(state), first.position);
  }

  next(state);
  const indent = peek(state);
  if (indent.type !== TokenType.Indent) {
    throw error(
      state,
      `Expected an indented block after '${header}'`,
      indent,
      ErrorCode.INCONSISTENT_INDENTATION,
    );
  }
  next(state);

  const statements: Statement[] = [];
  while (peek(state).type !== TokenType.Dedent && peek(state).type !== TokenType.EOF) {
    if (peek(state).type === TokenType.Newline) {
      next(state);
      continue;
    }
    if (peek(state).type === TokenType.Indent) {
      throw error(state, "Unexpected indent", peek(state), ErrorCode.INCONSISTENT_INDENTATION);
    }
    statements.push(...parseStatement(state));
  }
  if (peek(state).type === TokenType.Dedent) next(state);

  return createBlock(statements, statements[0]?.position ?? indent.position);
}

function parseIf(state: ParserState): Statement {
  const keyword = next(state);
  const cond = parseTest(state);
  const body = parseSuite(state, "if");
  const elifs: ElifClause[] = [];
  let orelse: Block | undefined;

  while (isKeyword(peek(state), "elif")) {
    next(state);
    const elifCond = parseTest(state);
    elifs.push({ cond: elifCond, body: parseSuite(state, "elif") });
  }

  if (isKeyword(peek(state), "else")) {
    next(state);
    orelse = parseSuite(state, "else");
  }

  return createIf(cond, body, elifs, orelse, keyword.position);
}

function parseLoopElse(state: ParserState): Block | undefined {
  if (!isKeyword(peek(state), "else")) return undefined;
  next(state);
  return parseSuite(state, "else");
}

function parseWhile(state: ParserState): Statement {
  const keyword = next(state);
  const cond = parseTest(state);
  const body = parseSuite(state, "while");
  return createWhile(cond, body, parseLoopElse(state), keyword.position);
}

function parseFor(state: ParserState): Statement {
  const keyword = next(state);
  const targetToken = peek(state);
  const target = toAssignTarget(state, parseTargetList(state), targetToken);

  const inToken = peek(state);
  if (!isKeyword(inToken, "in")) {
    throw error(state, `Expected 'in' but found ${describeToken(inToken)}`, inToken);
  }
  next(state);

  const iterable = parseExpressionList(state);
  const body = parseSuite(state, "for");
  return createFor(target, iterable, body, parseLoopElse(state), keyword.position);
}

/**
 * Loop targets stop below comparisons so that `in` is left for the loop header
 */
function parseTargetList(state: ParserState): Expression {
  const first = parseArith(state);
  if (!isOp(peek(state), ",")) return first;

  const elements = [first];
  while (isOp(peek(state), ",")) {
    next(state);
    if (isKeyword(peek(state), "in")) break;
    elements.push(parseArith(state));
  }
  return createTuple(elements, first.position);
}

function parseFunctionDef(state: ParserState): Statement {
  const keyword = next(state);
  const name = expectName(state, "after 'def'");
  expectOp(state, "(", "after function name");

  const params: Identifier[] = [];
  while (!isOp(peek(state), ")")) {
    const token = peek(state);
    if (isOp(token, "*") || isOp(token, "**") || isOp(token, "/")) {
      throw error(state, "Variadic and positional-only parameters are not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
    }
    const param = expectName(state, "in parameter list");
    // annotations are accepted and ignored
    if (isOp(peek(state), ":")) {
      next(state);
      parseTest(state);
    }
    if (isOp(peek(state), "=")) {
      throw error(state, "Default parameter values are not supported", peek(state), ErrorCode.UNSUPPORTED_SYNTAX);
    }
    params.push(createIdentifier(param.value, param.position));
    if (!isOp(peek(state), ",")) break;
    next(state);
  }
  expectOp(state, ")", "to close the parameter list");

  if (isOp(peek(state), "->")) {
    next(state);
    parseTest(state);
  }

  const body = parseSuite(state, "def");
  return createFunctionDef(name.value, params, body.statements, keyword.position);
}

// ============================================================================
// Expressions
// ============================================================================

function startsExpression(token: Token): boolean {
  switch (token.type) {
    case TokenType.Name:
    case TokenType.Number:
    case TokenType.String:
      return true;
    case TokenType.Keyword:
      return ["not", "True", "False", "None"].includes(token.value);
    case TokenType.Operator:
      return ["(", "[", "{", "-", "+"].includes(token.value);
    default:
      return false;
  }
}

/**
 * `a, b, c` as a TupleExpr; a single expression without a trailing comma stays as is
 */
function parseExpressionList(state: ParserState): Expression {
  const first = parseTest(state);
  if (!isOp(peek(state), ",")) return first;

  const elements = [first];
  while (isOp(peek(state), ",")) {
    next(state);
    if (!startsExpression(peek(state))) break;
    elements.push(parseTest(state));
  }
  return createTuple(elements, first.position);
}

function parseTest(state: ParserState): Expression {
  return parseOr(state);
}

function parseOr(state: ParserState): Expression {
  let left = parseAnd(state);
  while (isKeyword(peek(state), "or")) {
    const op = next(state);
    left = createBinary(left, "or", parseAnd(state), op.position);
  }
  return left;
}

function parseAnd(state: ParserState): Expression {
  let left = parseComparison(state);
  while (isKeyword(peek(state), "and")) {
    const op = next(state);
    left = createBinary(left, "and", parseComparison(state), op.position);
  }
  return left;
}

/**
 * Comparison operator at the cursor, with the number of tokens it spans
 */
function matchComparisonOperator(state: ParserState): { op: ComparisonOperator; length: number } | null {
  const token = peek(state);

  if (token.type === TokenType.Operator) {
    switch (token.value) {
      case "==":
      case "!=":
      case "<":
      case "<=":
      case ">":
      case ">=":
        return { op: token.value, length: 1 };
      default:
        return null;
    }
  }
  if (isKeyword(token, "in")) return { op: "in", length: 1 };
  if (isKeyword(token, "not") && isKeyword(peek(state, 1), "in")) return { op: "not in", length: 2 };
  if (isKeyword(token, "is")) {
    return isKeyword(peek(state, 1), "not") ? { op: "is not", length: 2 } : { op: "is", length: 1 };
  }
  return null;
}

function parseComparison(state: ParserState): Expression {
  const left = parseArith(state);
  const match = matchComparisonOperator(state);
  if (!match) return left;

  const opToken = peek(state);
  for (let i = 0; i < match.length; i++) next(state);
  const node = createComparison(left, match.op, parseArith(state), opToken.position);

  const chained = peek(state);
  if (matchComparisonOperator(state)) {
    throw error(state, "Chained comparisons are not supported", chained, ErrorCode.UNSUPPORTED_SYNTAX);
  }
  return node;
}

function parseBinaryLevel(
  state: ParserState,
  operators: readonly BinaryOperator[],
  parseOperand: (state: ParserState) => Expression,
): Expression {
  let left = parseOperand(state);
  while (true) {
    const token = peek(state);
    const op = token.type === TokenType.Operator
      ? operators.find((candidate) => candidate === token.value)
      : undefined;
    if (!op) return left;
    next(state);
    left = createBinary(left, op, parseOperand(state), token.position);
  }
}

function parseArith(state: ParserState): Expression {
  return parseBinaryLevel(state, ["+", "-"], parseTerm);
}

function parseTerm(state: ParserState): Expression {
  const expr = parseBinaryLevel(state, ["*", "/", "//", "%"], parsePower);
  const token = peek(state);
  if (isOp(token, "@") || isOp(token, "&") || isOp(token, "|") || isOp(token, "^") ||
    isOp(token, "<<") || isOp(token, ">>")) {
    throw error(state, `Operator '${token.value}' is not supported`, token, ErrorCode.UNSUPPORTED_SYNTAX);
  }
  return expr;
}

function parsePower(state: ParserState): Expression {
  const base = parseUnary(state);
  const token = peek(state);
  if (!isOp(token, "**")) return base;
  next(state);
  return createBinary(base, "**", parsePower(state), token.position);
}

/**
 * Prefix `-`, `+` and `not`, all binding tighter than `**`
 */
function parseUnary(state: ParserState): Expression {
  const token = peek(state);
  if (isOp(token, "-")) {
    next(state);
    return createUnary(UnaryOp.Neg, parseUnary(state), token.position);
  }
  if (isKeyword(token, "not")) {
    next(state);
    return createUnary(UnaryOp.Not, parseUnary(state), token.position);
  }
  if (isOp(token, "+")) {
    next(state);
    return parseUnary(state);
  }
  if (isOp(token, "~")) {
    throw error(state, "Operator '~' is not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
  }
  return parsePrimary(state);
}

function parsePrimary(state: ParserState): Expression {
  let expr = parseAtom(state);

  while (true) {
    const token = peek(state);
    if (isOp(token, "(")) {
      next(state);
      expr = createCall(expr, parseCallArguments(state), token.position);
    } else if (isOp(token, "[")) {
      next(state);
      const index = parseSubscriptIndex(state);
      expectOp(state, "]", "to close the subscript");
      expr = createSubscript(expr, index, token.position);
    } else if (isOp(token, ".")) {
      next(state);
      const attr = expectName(state, "after '.'");
      expr = createAttribute(expr, attr.value, attr.position);
    } else {
      return expr;
    }
  }
}

function parseCallArguments(state: ParserState): Expression[] {
  const args: Expression[] = [];
  while (!isOp(peek(state), ")")) {
    const token = peek(state);
    if (isOp(token, "*") || isOp(token, "**")) {
      throw error(state, "Argument unpacking is not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
    }
    if (token.type === TokenType.Name && isOp(peek(state, 1), "=")) {
      throw error(state, "Keyword arguments are not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
    }
    args.push(parseTest(state));
    rejectComprehension(state);
    if (!isOp(peek(state), ",")) break;
    next(state);
  }
  expectOp(state, ")", "to close the argument list");
  return args;
}

function parseSubscriptIndex(state: ParserState): Expression | Slice {
  const start = peek(state);
  const isSliceEnd = () => isOp(peek(state), "]") || isOp(peek(state), ",");

  const lower = isOp(start, ":") ? undefined : parseTest(state);
  if (!isOp(peek(state), ":")) {
    if (lower && isOp(peek(state), ",")) {
      const elements = [lower];
      while (isOp(peek(state), ",")) {
        next(state);
        if (isOp(peek(state), "]")) break;
        elements.push(parseTest(state));
      }
      return createTuple(elements, lower.position);
    }
    if (!lower) throw unexpected(state, peek(state));
    return lower;
  }

  next(state);
  const upper = isOp(peek(state), ":") || isSliceEnd() ? undefined : parseTest(state);
  let step: Expression | undefined;
  if (isOp(peek(state), ":")) {
    next(state);
    step = isSliceEnd() ? undefined : parseTest(state);
  }
  if (isOp(peek(state), ",")) {
    throw error(state, "Multi-dimensional slices are not supported", peek(state), ErrorCode.UNSUPPORTED_SYNTAX);
  }
  return createSlice({ lower, upper, step }, start.position);
}

function rejectComprehension(state: ParserState): void {
  const token = peek(state);
  if (isKeyword(token, "for")) {
    throw error(state, "Comprehensions are not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
  }
  if (isKeyword(token, "if")) {
    throw error(state, "Conditional expressions are not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
  }
}

/**
 * Comma-separated expressions up to `close`, trailing comma allowed
 */
function parseElements(state: ParserState, close: string, first?: Expression): Expression[] {
  const elements: Expression[] = first ? [first] : [];
  if (first) {
    if (!isOp(peek(state), ",")) {
      expectOp(state, close);
      return elements;
    }
    next(state);
  }
  while (!isOp(peek(state), close)) {
    elements.push(parseTest(state));
    rejectComprehension(state);
    if (!isOp(peek(state), ",")) break;
    next(state);
  }
  expectOp(state, close);
  return elements;
}

function parseAtom(state: ParserState): Expression {
  const token = peek(state);
  const position = token.position;

  switch (token.type) {
    case TokenType.Name:
      next(state);
      return createIdentifier(token.value, position);

    case TokenType.Number:
      next(state);
      return parseNumber(state, token);

    case TokenType.String: {
      let value = "";
      while (peek(state).type === TokenType.String) {
        value += next(state).value;
      }
      return createString(value, position);
    }

    case TokenType.Keyword:
      switch (token.value) {
        case "True":
          next(state);
          return createBool(true, position);
        case "False":
          next(state);
          return createBool(false, position);
        case "None":
          next(state);
          return createNone(position);
        case "lambda":
          throw error(state, "Lambda expressions are not supported", token, ErrorCode.UNSUPPORTED_SYNTAX);
        default:
          throw unexpected(state, token);
      }

    case TokenType.Operator:
      switch (token.value) {
        case "(":
          next(state);
          return parseParenthesized(state, position);
        case "[": {
          next(state);
          return createList(parseElements(state, "]"), position);
        }
        case "{":
          next(state);
          return parseBraced(state, position);
        default:
          throw unexpected(state, token);
      }

    default:
      throw unexpected(state, token);
  }
}

function parseParenthesized(state: ParserState, position: Position): Expression {
  if (isOp(peek(state), ")")) {
    next(state);
    return createTuple([], position);
  }

  const first = parseTest(state);
  rejectComprehension(state);
  if (!isOp(peek(state), ",")) {
    expectOp(state, ")");
    return first;
  }
  return createTuple(parseElements(state, ")", first), position);
}

function parseBraced(state: ParserState, position: Position): Expression {
  if (isOp(peek(state), "}")) {
    next(state);
    return createDict([], position);
  }

  const first = parseTest(state);
  if (!isOp(peek(state), ":")) {
    rejectComprehension(state);
    return createSet(parseElements(state, "}", first), position);
  }

  const pairs: DictEntry[] = [];
  let key = first;
  while (true) {
    expectOp(state, ":", "in dict literal");
    pairs.push({ key, value: parseTest(state) });
    rejectComprehension(state);
    if (!isOp(peek(state), ",")) break;
    next(state);
    if (isOp(peek(state), "}")) break;
    key = parseTest(state);
  }
  expectOp(state, "}", "to close the dict literal");
  return createDict(pairs, position);
}

function parseNumber(state: ParserState, token: Token): Expression {
  const text = token.value.replace(/_/g, "");
  const lower = text.toLowerCase();

  if (lower.startsWith("0x") || lower.startsWith("0o") || lower.startsWith("0b")) {
    const radix = lower[1] === "x" ? 16 : lower[1] === "o" ? 8 : 2;
    return createInt(parseInt(text.slice(2), radix), token.position, token.value);
  }

  if (text.includes(".") || lower.includes("e")) {
    return createFloat(Number(text), token.position);
  }

  if (/^0\d+$/.test(text) && /[1-9]/.test(text)) {
    throw error(state, "Invalid decimal literal with leading zeros", token, ErrorCode.INVALID_NUMBER);
  }
  return createInt(Number(text), token.position, token.value);
}
