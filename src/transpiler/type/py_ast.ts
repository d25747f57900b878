// src/transpiler/type/py_ast.ts - AST for the supported Python subset

export interface Position {
  line: number;
  column: number;
}

interface BaseNode {
  readonly position?: Position;
}

// ============================================================================
// Expressions
// ============================================================================

export type LiteralType = "int" | "float" | "str" | "bool" | "none";

export interface LiteralExpr extends BaseNode {
  readonly kind: "LiteralExpr";
  readonly value: number | string | boolean | null;
  readonly literalType: LiteralType;
  /** Source spelling of a numeric literal */
  readonly raw?: string;
}

export interface Identifier extends BaseNode {
  readonly kind: "Identifier";
  readonly name: string;
}

export enum UnaryOp {
  Neg = "-",
  Not = "not",
}

export interface UnaryExpr extends BaseNode {
  readonly kind: "UnaryExpr";
  readonly op: UnaryOp;
  readonly operand: Expression;
}

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "//" | "%" | "**";
export type LogicalOperator = "and" | "or";
export type BinaryOperator = ArithmeticOperator | LogicalOperator;

export interface BinaryExpr extends BaseNode {
  readonly kind: "BinaryExpr";
  readonly left: Expression;
  readonly op: BinaryOperator;
  readonly right: Expression;
}

export type ComparisonOperator =
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "in"
  | "not in"
  | "is"
  | "is not";

export interface ComparisonExpr extends BaseNode {
  readonly kind: "ComparisonExpr";
  readonly left: Expression;
  readonly op: ComparisonOperator;
  readonly right: Expression;
}

export interface CallExpr extends BaseNode {
  readonly kind: "CallExpr";
  readonly callee: Expression;
  readonly args: readonly Expression[];
}

export interface ListExpr extends BaseNode {
  readonly kind: "ListExpr";
  readonly elements: readonly Expression[];
}

export interface TupleExpr extends BaseNode {
  readonly kind: "TupleExpr";
  readonly elements: readonly Expression[];
}

export interface SetExpr extends BaseNode {
  readonly kind: "SetExpr";
  readonly elements: readonly Expression[];
}

export interface DictEntry {
  readonly key: Expression;
  readonly value: Expression;
}

export interface DictExpr extends BaseNode {
  readonly kind: "DictExpr";
  readonly pairs: readonly DictEntry[];
}

/** `lower:upper:step` inside a subscript; every part may be omitted */
export interface Slice extends BaseNode {
  readonly kind: "Slice";
  readonly lower?: Expression;
  readonly upper?: Expression;
  readonly step?: Expression;
}

export interface Subscript extends BaseNode {
  readonly kind: "Subscript";
  readonly value: Expression;
  readonly index: Expression | Slice;
}

export interface Attribute extends BaseNode {
  readonly kind: "Attribute";
  readonly value: Expression;
  readonly attr: string;
}

export type CollectionExpr = ListExpr | TupleExpr | SetExpr | DictExpr;

export type Expression =
  | LiteralExpr
  | Identifier
  | UnaryExpr
  | BinaryExpr
  | ComparisonExpr
  | CallExpr
  | CollectionExpr
  | Subscript
  | Attribute;

// ============================================================================
// Statements
// ============================================================================

export type AssignOperator = "=" | "+=" | "-=" | "*=" | "/=" | "//=" | "%=" | "**=";

/** Tuple and list patterns hold nested targets */
export type AssignTarget = Identifier | Subscript | Attribute | TupleExpr | ListExpr;

export interface Assign extends BaseNode {
  readonly kind: "Assign";
  readonly target: AssignTarget;
  readonly op: AssignOperator;
  readonly value: Expression;
}

export interface ExprStmt extends BaseNode {
  readonly kind: "ExprStmt";
  readonly expr: Expression;
}

export interface Return extends BaseNode {
  readonly kind: "Return";
  readonly value?: Expression;
}

export interface Break extends BaseNode {
  readonly kind: "Break";
}

export interface Continue extends BaseNode {
  readonly kind: "Continue";
}

export interface Pass extends BaseNode {
  readonly kind: "Pass";
}

export interface Import extends BaseNode {
  readonly kind: "Import";
  readonly names: readonly string[];
}

export interface Block extends BaseNode {
  readonly kind: "Block";
  readonly statements: readonly Statement[];
}

export interface ElifClause {
  readonly cond: Expression;
  readonly body: Block;
}

export interface If extends BaseNode {
  readonly kind: "If";
  readonly cond: Expression;
  readonly body: Block;
  readonly elifs: readonly ElifClause[];
  readonly orelse?: Block;
}

export interface While extends BaseNode {
  readonly kind: "While";
  readonly cond: Expression;
  readonly body: Block;
  readonly orelse?: Block;
}

export interface For extends BaseNode {
  readonly kind: "For";
  readonly target: AssignTarget;
  readonly iterable: Expression;
  readonly body: Block;
  readonly orelse?: Block;
}

export interface FunctionDef extends BaseNode {
  readonly kind: "FunctionDef";
  readonly name: string;
  readonly params: readonly Identifier[];
  readonly body: readonly Statement[];
}

export type SimpleStatement =
  | Assign
  | ExprStmt
  | Return
  | Break
  | Continue
  | Pass
  | Import;

export type CompoundStatement = If | While | For | Block | FunctionDef;

export type Statement = SimpleStatement | CompoundStatement;

export interface Module extends BaseNode {
  readonly kind: "Module";
  readonly body: readonly Statement[];
}

export type Node = Module | Statement | Expression | Slice;

// ============================================================================
// Factories
// ============================================================================

export function createModule(body: readonly Statement[]): Module {
  return { kind: "Module", body };
}

export function createLiteral(
  value: number | string | boolean | null,
  literalType: LiteralType,
  position?: Position,
): LiteralExpr {
  return { kind: "LiteralExpr", value, literalType, position };
}

export function createInt(value: number, position?: Position, raw?: string): LiteralExpr {
  return { kind: "LiteralExpr", value, literalType: "int", position, raw };
}

export function createFloat(value: number, position?: Position): LiteralExpr {
  return createLiteral(value, "float", position);
}

export function createString(value: string, position?: Position): LiteralExpr {
  return createLiteral(value, "str", position);
}

export function createBool(value: boolean, position?: Position): LiteralExpr {
  return createLiteral(value, "bool", position);
}

export function createNone(position?: Position): LiteralExpr {
  return createLiteral(null, "none", position);
}

export function createIdentifier(name: string, position?: Position): Identifier {
  return { kind: "Identifier", name, position };
}

export function createUnary(op: UnaryOp, operand: Expression, position?: Position): UnaryExpr {
  return { kind: "UnaryExpr", op, operand, position };
}

export function createBinary(
  left: Expression,
  op: BinaryOperator,
  right: Expression,
  position?: Position,
): BinaryExpr {
  return { kind: "BinaryExpr", left, op, right, position };
}

export function createComparison(
  left: Expression,
  op: ComparisonOperator,
  right: Expression,
  position?: Position,
): ComparisonExpr {
  return { kind: "ComparisonExpr", left, op, right, position };
}

export function createCall(
  callee: Expression,
  args: readonly Expression[],
  position?: Position,
): CallExpr {
  return { kind: "CallExpr", callee, args, position };
}

export function createList(elements: readonly Expression[], position?: Position): ListExpr {
  return { kind: "ListExpr", elements, position };
}

export function createTuple(elements: readonly Expression[], position?: Position): TupleExpr {
  return { kind: "TupleExpr", elements, position };
}

export function createSet(elements: readonly Expression[], position?: Position): SetExpr {
  return { kind: "SetExpr", elements, position };
}

export function createDict(pairs: readonly DictEntry[], position?: Position): DictExpr {
  return { kind: "DictExpr", pairs, position };
}

export function createSlice(
  parts: { lower?: Expression; upper?: Expression; step?: Expression },
  position?: Position,
): Slice {
  return { kind: "Slice", ...parts, position };
}

export function createSubscript(
  value: Expression,
  index: Expression | Slice,
  position?: Position,
): Subscript {
  return { kind: "Subscript", value, index, position };
}

export function createAttribute(value: Expression, attr: string, position?: Position): Attribute {
  return { kind: "Attribute", value, attr, position };
}

export function createAssign(
  target: AssignTarget,
  op: AssignOperator,
  value: Expression,
  position?: Position,
): Assign {
  return { kind: "Assign", target, op, value, position };
}

export function createExprStmt(expr: Expression, position?: Position): ExprStmt {
  return { kind: "ExprStmt", expr, position };
}

export function createReturn(value?: Expression, position?: Position): Return {
  return { kind: "Return", value, position };
}

export function createBreak(position?: Position): Break {
  return { kind: "Break", position };
}

export function createContinue(position?: Position): Continue {
  return { kind: "Continue", position };
}

export function createPass(position?: Position): Pass {
  return { kind: "Pass", position };
}

export function createImport(names: readonly string[], position?: Position): Import {
  return { kind: "Import", names, position };
}

export function createBlock(statements: readonly Statement[], position?: Position): Block {
  return { kind: "Block", statements, position };
}

export function createIf(
  cond: Expression,
  body: Block,
  elifs: readonly ElifClause[] = [],
  orelse?: Block,
  position?: Position,
): If {
  return { kind: "If", cond, body, elifs, orelse, position };
}

export function createWhile(cond: Expression, body: Block, orelse?: Block, position?: Position): While {
  return { kind: "While", cond, body, orelse, position };
}

export function createFor(
  target: AssignTarget,
  iterable: Expression,
  body: Block,
  orelse?: Block,
  position?: Position,
): For {
  return { kind: "For", target, iterable, body, orelse, position };
}

export function createFunctionDef(
  name: string,
  params: readonly Identifier[],
  body: readonly Statement[],
  position?: Position,
): FunctionDef {
  return { kind: "FunctionDef", name, params, body, position };
}

// ============================================================================
// Guards and traversal
// ============================================================================

const EXPRESSION_KINDS: ReadonlySet<string> = new Set([
  "LiteralExpr",
  "Identifier",
  "UnaryExpr",
  "BinaryExpr",
  "ComparisonExpr",
  "CallExpr",
  "ListExpr",
  "TupleExpr",
  "SetExpr",
  "DictExpr",
  "Subscript",
  "Attribute",
]);

export function isExpression(node: Node): node is Expression {
  return EXPRESSION_KINDS.has(node.kind);
}

export function isStatement(node: Node): node is Statement {
  return node.kind !== "Module" && node.kind !== "Slice" && !isExpression(node);
}

/**
 * Direct children of a node, in source order
 */
export function getChildNodes(node: Node): Node[] {
  switch (node.kind) {
    case "Module":
      return [...node.body];
    case "LiteralExpr":
    case "Identifier":
    case "Break":
    case "Continue":
    case "Pass":
    case "Import":
      return [];
    case "UnaryExpr":
      return [node.operand];
    case "BinaryExpr":
    case "ComparisonExpr":
      return [node.left, node.right];
    case "CallExpr":
      return [node.callee, ...node.args];
    case "ListExpr":
    case "TupleExpr":
    case "SetExpr":
      return [...node.elements];
    case "DictExpr":
      return node.pairs.flatMap((pair) => [pair.key, pair.value]);
    case "Slice":
      return [node.lower, node.upper, node.step].filter((part): part is Expression => part !== undefined);
    case "Subscript":
      return [node.value, node.index];
    case "Attribute":
      return [node.value];
    case "Assign":
      return [node.target, node.value];
    case "ExprStmt":
      return [node.expr];
    case "Return":
      return node.value ? [node.value] : [];
    case "Block":
      return [...node.statements];
    case "If":
      return [
        node.cond,
        node.body,
        ...node.elifs.flatMap((clause) => [clause.cond, clause.body]),
        ...(node.orelse ? [node.orelse] : []),
      ];
    case "While":
      return [node.cond, node.body, ...(node.orelse ? [node.orelse] : [])];
    case "For":
      return [node.target, node.iterable, node.body, ...(node.orelse ? [node.orelse] : [])];
    case "FunctionDef":
      return [...node.params, ...node.body];
  }
}

/**
 * Depth-first search for the first node satisfying the predicate
 */
export function findNode(root: Node, predicate: (node: Node) => boolean): Node | undefined {
  if (predicate(root)) return root;
  for (const child of getChildNodes(root)) {
    const found = findNode(child, predicate);
    if (found) return found;
  }
  return undefined;
}
