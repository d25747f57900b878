// src/transpiler/tokenizer/tokenizer.ts
// Line-aware lexer producing NEWLINE/INDENT/DEDENT tokens for the Python subset

import { ParseError } from "../../common/error.ts";
import { ErrorCode } from "../../common/error-codes.ts";
import { globalLogger as logger } from "../../logger.ts";
import type { Position } from "../type/py_ast.ts";
import { processEscapeSequences } from "../utils/escape-sequences.ts";

export enum TokenType {
  Name = "NAME",
  Keyword = "KEYWORD",
  Number = "NUMBER",
  String = "STRING",
  Operator = "OPERATOR",
  Newline = "NEWLINE",
  Indent = "INDENT",
  Dedent = "DEDENT",
  EOF = "EOF",
}

export interface Token {
  type: TokenType;
  /** Decoded text for strings, raw text otherwise */
  value: string;
  position: Position;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await",
  "break", "class", "continue", "def", "del", "elif", "else", "except",
  "finally", "for", "from", "global", "if", "import", "in", "is",
  "lambda", "nonlocal", "not", "or", "pass", "raise", "return", "try",
  "while", "with", "yield",
]);

// Longest first, so that "**=" wins over "**" and "*"
const OPERATORS = [
  "**=", "//=", ">>=", "<<=",
  "**", "//", "==", "!=", "<=", ">=", "+=", "-=", "*=", "/=", "%=",
  "&=", "|=", "^=", "->", "<<", ">>", ":=",
  "+", "-", "*", "/", "%", "<", ">", "=", "(", ")", "[", "]", "{", "}",
  ",", ":", ".", ";", "@", "&", "|", "^", "~",
] as const;

const CLOSING_BRACKETS: Readonly<Record<string, string>> = { ")": "(", "]": "[", "}": "{" };

const TOKEN_PATTERNS = {
  IDENTIFIER_START: /[\p{L}_]/u,
  IDENTIFIER: /^[\p{L}\p{N}_]+/u,
  NUMBER: /^(?:0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|(?:\d(?:_?\d)*\.(?:\d(?:_?\d)*)?|\.\d(?:_?\d)*|\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?)/,
  STRING_PREFIX: /^(?:r|u|R|U|b|B|f|F|rb|br|Rb|bR|rB|Br|RB|BR|fr|rf|Fr|fR|rF|Rf|FR|RF)$/,
};

const TAB_SIZE = 8;

// ============================================================================
// Token streams
// ============================================================================

/**
 * Pull interface consumed by the parser
 */
export interface TokenStream {
  /** Return the current token and advance; EOF repeats at the end */
  next(): Token;
  /** Look ahead without consuming */
  peek(offset?: number): Token;
  readonly source?: string;
  readonly filePath?: string;
}

export class ArrayTokenStream implements TokenStream {
  private pos = 0;
  private readonly tokens: Token[];
  readonly source?: string;
  readonly filePath?: string;

  constructor(tokens: Token[], opts: { source?: string; filePath?: string } = {}) {
    const last = tokens[tokens.length - 1];
    this.tokens = last?.type === TokenType.EOF
      ? tokens
      : [...tokens, { type: TokenType.EOF, value: "", position: last?.position ?? { line: 1, column: 1 } }];
    this.source = opts.source;
    this.filePath = opts.filePath;
  }

  next(): Token {
    const token = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return token;
  }

  peek(offset = 0): Token {
    const index = Math.min(this.pos + offset, this.tokens.length - 1);
    return this.tokens[index];
  }
}

// ============================================================================
// Tokenizer
// ============================================================================

interface LexerState {
  input: string;
  pos: number;
  line: number;
  column: number;
  filePath?: string;
  tokens: Token[];
  indentStack: number[];
  brackets: { char: string; position: Position }[];
  atLineStart: boolean;
}

function errorOptions(position: Position, state: LexerState) {
  return {
    line: position.line,
    column: position.column,
    filePath: state.filePath,
    source: state.input,
  };
}

function currentPosition(state: LexerState): Position {
  return { line: state.line, column: state.column };
}

function advance(state: LexerState, count = 1): void {
  for (let i = 0; i < count && state.pos < state.input.length; i++) {
    if (state.input[state.pos] === "\n") {
      state.line++;
      state.column = 1;
    } else {
      state.column++;
    }
    state.pos++;
  }
}

function pushToken(state: LexerState, type: TokenType, value: string, position: Position): void {
  state.tokens.push({ type, value, position });
}

/**
 * Tokenize Python-subset source text.
 *
 * Blank and comment-only lines produce no tokens. Newlines inside brackets
 * and after a backslash join lines.
 *
 * @throws {ParseError} on unterminated strings, unknown characters,
 * inconsistent dedents and unbalanced brackets
 */
export function tokenize(source: string, filePath?: string): Token[] {
  const state: LexerState = {
    input: source.replace(/\r\n?/g, "\n"),
    pos: 0,
    line: 1,
    column: 1,
    filePath,
    tokens: [],
    indentStack: [0],
    brackets: [],
    atLineStart: true,
  };

  while (state.pos < state.input.length) {
    if (state.atLineStart && state.brackets.length === 0) {
      handleIndentation(state);
      continue;
    }
    scanToken(state);
  }

  finish(state);
  logger.debug(`Produced ${state.tokens.length} tokens`, "tokenizer");
  return state.tokens;
}

export function createTokenStream(source: string, filePath?: string): TokenStream {
  return new ArrayTokenStream(tokenize(source, filePath), { source, filePath });
}

function handleIndentation(state: LexerState): void {
  let width = 0;
  while (state.pos < state.input.length) {
    const char = state.input[state.pos];
    if (char === " ") width++;
    else if (char === "\t") width = (Math.floor(width / TAB_SIZE) + 1) * TAB_SIZE;
    else if (char === "\f") width = 0;
    else break;
    advance(state);
  }

  const char = state.input[state.pos];
  // blank or comment-only line
  if (char === undefined || char === "\n" || char === "#") {
    skipComment(state);
    if (state.input[state.pos] === "\n") advance(state);
    return;
  }

  state.atLineStart = false;
  const position = currentPosition(state);
  const current = state.indentStack[state.indentStack.length - 1];

  if (width > current) {
    state.indentStack.push(width);
    pushToken(state, TokenType.Indent, "", position);
    return;
  }

  while (width < state.indentStack[state.indentStack.length - 1]) {
    state.indentStack.pop();
    pushToken(state, TokenType.Dedent, "", position);
  }

  if (width !== state.indentStack[state.indentStack.length - 1]) {
    throw new ParseError(
      "Unindent does not match any outer indentation level",
      { ...errorOptions(position, state), code: ErrorCode.INCONSISTENT_INDENTATION },
    );
  }
}

function skipComment(state: LexerState): void {
  if (state.input[state.pos] !== "#") return;
  while (state.pos < state.input.length && state.input[state.pos] !== "\n") {
    advance(state);
  }
}

function scanToken(state: LexerState): void {
  const char = state.input[state.pos];
  const position = currentPosition(state);

  if (char === " " || char === "\t" || char === "\f") {
    advance(state);
    return;
  }

  if (char === "#") {
    skipComment(state);
    return;
  }

  if (char === "\\") {
    if (state.input[state.pos + 1] === "\n") {
      advance(state, 2);
      return;
    }
    throw new ParseError(
      "Unexpected character after line continuation character",
      { ...errorOptions(position, state), code: ErrorCode.INVALID_CHARACTER },
    );
  }

  if (char === "\n") {
    advance(state);
    if (state.brackets.length > 0) return;
    const last = state.tokens[state.tokens.length - 1];
    if (last && last.type !== TokenType.Newline) {
      pushToken(state, TokenType.Newline, "", position);
    }
    state.atLineStart = true;
    return;
  }

  if (char === '"' || char === "'") {
    scanString(state, "", position);
    return;
  }

  if (/\d/.test(char) || (char === "." && /\d/.test(state.input[state.pos + 1] ?? ""))) {
    scanNumber(state, position);
    return;
  }

  if (TOKEN_PATTERNS.IDENTIFIER_START.test(char)) {
    scanName(state, position);
    return;
  }

  const rest = state.input.slice(state.pos, state.pos + 3);
  const op = OPERATORS.find((candidate) => rest.startsWith(candidate));
  if (op) {
    trackBracket(state, op, position);
    advance(state, op.length);
    pushToken(state, TokenType.Operator, op, position);
    return;
  }

  throw new ParseError(
    `Unexpected character '${char}'`,
    { ...errorOptions(position, state), code: ErrorCode.INVALID_CHARACTER },
  );
}

function trackBracket(state: LexerState, op: string, position: Position): void {
  if (op === "(" || op === "[" || op === "{") {
    state.brackets.push({ char: op, position });
    return;
  }

  const expected = CLOSING_BRACKETS[op];
  if (expected === undefined) return;

  const open = state.brackets.pop();
  if (!open) {
    throw new ParseError(`Unmatched '${op}'`, {
      ...errorOptions(position, state),
      code: ErrorCode.UNEXPECTED_TOKEN,
    });
  }
  if (open.char !== expected) {
    throw new ParseError(
      `Closing '${op}' does not match opening '${open.char}' at line ${open.position.line}`,
      { ...errorOptions(position, state), code: ErrorCode.UNEXPECTED_TOKEN },
    );
  }
}

function scanName(state: LexerState, position: Position): void {
  const match = TOKEN_PATTERNS.IDENTIFIER.exec(state.input.slice(state.pos));
  const name = match ? match[0] : state.input[state.pos];
  const nextChar = state.input[state.pos + name.length];

  if ((nextChar === '"' || nextChar === "'") && TOKEN_PATTERNS.STRING_PREFIX.test(name)) {
    const lowered = name.toLowerCase();
    if (lowered.includes("b") || lowered.includes("f")) {
      throw new ParseError(
        `String prefix '${name}' is not supported`,
        { ...errorOptions(position, state), code: ErrorCode.UNSUPPORTED_SYNTAX },
      );
    }
    advance(state, name.length);
    scanString(state, lowered, position);
    return;
  }

  advance(state, name.length);
  pushToken(state, KEYWORDS.has(name) ? TokenType.Keyword : TokenType.Name, name, position);
}

function scanNumber(state: LexerState, position: Position): void {
  const match = TOKEN_PATTERNS.NUMBER.exec(state.input.slice(state.pos));
  const text = match ? match[0] : "";
  const following = state.input[state.pos + text.length] ?? "";

  if (!text || /[\p{L}\p{N}_.]/u.test(following)) {
    throw new ParseError(
      `Invalid numeric literal near '${state.input.slice(state.pos, state.pos + text.length + 1)}'`,
      { ...errorOptions(position, state), code: ErrorCode.INVALID_NUMBER },
    );
  }

  advance(state, text.length);
  pushToken(state, TokenType.Number, text, position);
}

function scanString(state: LexerState, prefix: string, position: Position): void {
  const quote = state.input[state.pos];
  const triple = state.input.startsWith(quote.repeat(3), state.pos);
  const delimiter = triple ? quote.repeat(3) : quote;
  advance(state, delimiter.length);

  const start = state.pos;
  while (true) {
    if (state.pos >= state.input.length) {
      throw new ParseError(
        triple ? "Unterminated triple-quoted string literal" : "Unterminated string literal",
        { ...errorOptions(position, state), code: ErrorCode.UNTERMINATED_STRING },
      );
    }

    const char = state.input[state.pos];
    if (char === "\\") {
      advance(state, 2);
      continue;
    }
    if (char === "\n" && !triple) {
      throw new ParseError(
        "Unterminated string literal",
        { ...errorOptions(position, state), code: ErrorCode.UNTERMINATED_STRING },
      );
    }
    if (state.input.startsWith(delimiter, state.pos)) {
      break;
    }
    advance(state);
  }

  const body = state.input.slice(start, state.pos);
  advance(state, delimiter.length);

  const value = prefix.includes("r") ? body : processEscapeSequences(body);
  pushToken(state, TokenType.String, value, position);
}

function finish(state: LexerState): void {
  const open = state.brackets[state.brackets.length - 1];
  if (open) {
    throw new ParseError(`'${open.char}' was never closed`, {
      ...errorOptions(open.position, state),
      code: ErrorCode.UNCLOSED_BRACKET,
    });
  }

  const position = currentPosition(state);
  const last = state.tokens[state.tokens.length - 1];
  if (last && last.type !== TokenType.Newline && last.type !== TokenType.Dedent) {
    pushToken(state, TokenType.Newline, "", position);
  }

  while (state.indentStack.length > 1) {
    state.indentStack.pop();
    pushToken(state, TokenType.Dedent, "", position);
  }

  pushToken(state, TokenType.EOF, "", position);
}
