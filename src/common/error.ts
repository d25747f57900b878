/*
 * error.ts
 *
 * Error types and reporting for the transpiler:
 * 1. A base error carrying an error code, source location and context lines
 * 2. Specialized errors for parsing, code generation, scopes and configuration
 * 3. Terminal formatting with a caret under the offending column
 */

import { readFileSync } from "node:fs";
import { basename } from "node:path";
import chalk from "chalk";
import { globalLogger as logger, Logger } from "../logger.ts";
import { ErrorCode, formatErrorCode, getErrorCauses, getErrorDescription, getErrorFixes } from "./error-codes.ts";
import { type ContextLine, extractContextLinesFromSource } from "./context-helpers.ts";
import { getErrorMessage } from "./utils.ts";

// -----------------------------------------------------------------------------
// Message helpers
// -----------------------------------------------------------------------------

export function formatErrorMessage(error: unknown): string {
  return getErrorMessage(error);
}

function stripErrorCodeFromMessage(msg: string): string {
  return msg.replace(/^\[SP\d{4}\]\s*/, "");
}

/**
 * Prefix the message with its code and append the location
 */
function enhanceErrorMessage(
  msg: string,
  errorCode: ErrorCode,
  opts: { filePath?: string; line?: number; column?: number },
): string {
  let enhanced = `[${formatErrorCode(errorCode)}] ${stripErrorCodeFromMessage(msg)}`;

  if (opts.filePath && opts.line && opts.column) {
    enhanced += ` at ${opts.filePath}:${opts.line}:${opts.column}`;
  } else if (opts.line && opts.column) {
    enhanced += ` at line ${opts.line}:${opts.column}`;
  }

  return enhanced;
}

// -----------------------------------------------------------------------------
// Source locations
// -----------------------------------------------------------------------------

export interface SourceLocation {
  filePath?: string;
  line?: number;
  column?: number;
  source?: string;
}

export class SourceLocationInfo implements SourceLocation {
  filePath?: string;
  line?: number;
  column?: number;
  source?: string;

  constructor(opts: SourceLocation = {}) {
    this.filePath = opts.filePath;
    this.line = opts.line;
    this.column = opts.column;
    this.source = opts.source;
  }

  loadSource(): string | undefined {
    return this.source;
  }

  toString(): string {
    const l = this.line ? `:${this.line}` : "";
    const c = this.line && this.column ? `:${this.column}` : "";
    if (!this.filePath) return this.line ? `line ${this.line}${c}` : "<unknown location>";
    return `${this.filePath}${l}${c}`;
  }

  extractContextLines(count = 2): ContextLine[] {
    const src = this.loadSource();
    if (!src || !this.line) return [];
    return extractContextLinesFromSource(src, this.line, this.column, count);
  }
}

// -----------------------------------------------------------------------------
// Error base
// -----------------------------------------------------------------------------

enum ErrorType {
  GENERIC = "Error",
  PARSE = "Parse Error",
  CONFIG = "Configuration Error",
  CODEGEN = "Code Generation Error",
  SCOPE = "Scope Error",
}

interface TranspilerErrorOptions {
  errorType?: string;
  sourceLocation?: SourceLocation;
  originalError?: Error;
  code?: ErrorCode;
}

export class TranspilerError extends Error {
  readonly errorType: string;
  code?: ErrorCode;
  sourceLocation: SourceLocationInfo;
  readonly originalError?: Error;
  contextLines: ContextLine[] = [];

  constructor(msg: string, opts: TranspilerErrorOptions = {}) {
    super(msg);
    this.name = new.target.name;
    this.errorType = opts.errorType ?? ErrorType.GENERIC;
    this.originalError = opts.originalError;
    this.code = opts.code;
    this.sourceLocation = new SourceLocationInfo(opts.sourceLocation);

    if (this.sourceLocation.line) {
      this.contextLines = this.sourceLocation.extractContextLines();
    }
  }

  /**
   * Attach the source text once it is known, so that context lines can be shown.
   * Parse and codegen errors are raised deep in the pipeline, where only
   * positions are available.
   */
  withSource(source: string, filePath?: string): this {
    this.sourceLocation.source ??= source;
    this.sourceLocation.filePath ??= filePath;
    if (this.contextLines.length === 0) {
      this.contextLines = this.sourceLocation.extractContextLines();
    }
    return this;
  }

  getSummary(): string {
    const { filePath, line, column } = this.sourceLocation;
    const loc = filePath
      ? `${basename(filePath)}${line ? `:${line}${column ? `:${column}` : ""}` : ""}`
      : "";
    return loc ? `${this.errorType}: ${this.message} (${loc})` : `${this.errorType}: ${this.message}`;
  }

  getSuggestion(): string {
    if (this.code) {
      const fixes = getErrorFixes(this.code);
      if (fixes.length > 0) {
        return fixes[0];
      }
    }
    return "Check the code near this location for errors.";
  }

  /**
   * One-line description of the error code, if any
   */
  getHelpText(): string | null {
    return this.code ? getErrorDescription(this.code) : null;
  }
}

// -----------------------------------------------------------------------------
// Error code inference
// -----------------------------------------------------------------------------

type ErrorPattern = {
  /** All strings must be present in the lowercased message */
  test: string[];
  code: ErrorCode;
};

const PARSE_ERROR_PATTERNS: ErrorPattern[] = [
  { test: ["unterminated string"], code: ErrorCode.UNTERMINATED_STRING },
  { test: ["never closed"], code: ErrorCode.UNCLOSED_BRACKET },
  { test: ["unexpected end"], code: ErrorCode.UNEXPECTED_EOF },
  { test: ["unexpected character"], code: ErrorCode.INVALID_CHARACTER },
  { test: ["indent"], code: ErrorCode.INCONSISTENT_INDENTATION },
  { test: ["cannot assign"], code: ErrorCode.INVALID_ASSIGNMENT_TARGET },
  { test: ["not supported"], code: ErrorCode.UNSUPPORTED_SYNTAX },
  { test: ["invalid", "literal"], code: ErrorCode.INVALID_NUMBER },
  { test: ["unexpected"], code: ErrorCode.UNEXPECTED_TOKEN },
];

const CODEGEN_ERROR_PATTERNS: ErrorPattern[] = [
  { test: ["outside loop"], code: ErrorCode.LOOP_CONTROL_OUTSIDE_LOOP },
  { test: ["outside function"], code: ErrorCode.RETURN_OUTSIDE_FUNCTION },
  { test: ["range()"], code: ErrorCode.INVALID_RANGE_CALL },
  { test: ["source map"], code: ErrorCode.SOURCEMAP_GENERATION_FAILED },
  { test: ["unsupported"], code: ErrorCode.UNSUPPORTED_NODE },
];

function inferErrorCode(msg: string, patterns: ErrorPattern[], fallback: ErrorCode): ErrorCode {
  const lower = msg.toLowerCase();
  for (const { test, code } of patterns) {
    if (test.every((t) => lower.includes(t))) return code;
  }
  return fallback;
}

// -----------------------------------------------------------------------------
// Error classes
// -----------------------------------------------------------------------------

export class ParseError extends TranspilerError {
  constructor(
    msg: string,
    opts: {
      line: number;
      column: number;
      filePath?: string;
      source?: string;
      originalError?: Error;
      code?: ErrorCode;
    },
  ) {
    const errorCode = opts.code ?? inferErrorCode(msg, PARSE_ERROR_PATTERNS, ErrorCode.INVALID_SYNTAX);

    super(enhanceErrorMessage(msg, errorCode, opts), {
      errorType: ErrorType.PARSE,
      sourceLocation: opts,
      originalError: opts.originalError,
      code: errorCode,
    });
  }

  override getSuggestion(): string {
    const m = this.message.toLowerCase();
    if (m.includes("unterminated string")) {
      return "Add the closing quote to complete the string literal.";
    }
    if (m.includes("unexpected end of input")) {
      return "The code ends unexpectedly. Check for unclosed brackets or incomplete statements.";
    }
    if (m.includes("expected ':'")) {
      return "Compound statement headers (if, while, for, def) end with ':'.";
    }
    return super.getSuggestion();
  }
}

export interface CodeGenErrorOptions {
  nodeType?: string;
  line?: number;
  column?: number;
  filePath?: string;
  code?: ErrorCode;
  originalError?: Error;
}

interface PositionedNode {
  kind?: string;
  position?: { line: number; column: number };
}

export class CodeGenError extends TranspilerError {
  readonly nodeType?: string;

  constructor(
    msg: string,
    nodeTypeOrOpts: string | CodeGenErrorOptions = {},
    node?: PositionedNode,
  ) {
    const opts: CodeGenErrorOptions = typeof nodeTypeOrOpts === "string"
      ? { nodeType: nodeTypeOrOpts }
      : { ...nodeTypeOrOpts };

    if (node?.position) {
      opts.line ??= node.position.line;
      opts.column ??= node.position.column;
    }
    opts.nodeType ??= node?.kind;

    const errorCode = opts.code ?? inferErrorCode(msg, CODEGEN_ERROR_PATTERNS, ErrorCode.CODEGEN_FAILED);
    const { nodeType, originalError, code: _code, ...sourceLocation } = opts;

    super(enhanceErrorMessage(msg, errorCode, opts), {
      errorType: ErrorType.CODEGEN,
      sourceLocation,
      originalError,
      code: errorCode,
    });
    this.nodeType = nodeType;
  }

  override getSuggestion(): string {
    return this.nodeType
      ? `Problem generating code for ${this.nodeType} node. ${super.getSuggestion()}`
      : super.getSuggestion();
  }
}

/**
 * break or continue with no enclosing loop
 */
export class LoopControlError extends CodeGenError {
  constructor(keyword: "break" | "continue", node?: PositionedNode, filePath?: string) {
    super(`'${keyword}' outside loop`, { code: ErrorCode.LOOP_CONTROL_OUTSIDE_LOOP, filePath }, node);
  }
}

/**
 * Misuse of the scope stack. Raised by the generator itself, never by user input.
 */
export class ScopeError extends TranspilerError {
  constructor(msg: string) {
    super(enhanceErrorMessage(msg, ErrorCode.SCOPE_UNDERFLOW, {}), {
      errorType: ErrorType.SCOPE,
      code: ErrorCode.SCOPE_UNDERFLOW,
    });
  }
}

export class ConfigError extends TranspilerError {
  readonly key?: string;

  constructor(
    msg: string,
    opts: { key?: string; filePath?: string; code?: ErrorCode; originalError?: Error } = {},
  ) {
    const errorCode = opts.code ?? ErrorCode.INVALID_CONFIG_VALUE;
    super(enhanceErrorMessage(msg, errorCode, {}), {
      errorType: ErrorType.CONFIG,
      sourceLocation: { filePath: opts.filePath },
      originalError: opts.originalError,
      code: errorCode,
    });
    this.key = opts.key;
  }
}

// -----------------------------------------------------------------------------
// Formatting
// -----------------------------------------------------------------------------

export interface FormatErrorOptions {
  /** Emit ANSI colors (default: true) */
  color?: boolean;
  /** Append the stack trace */
  debug?: boolean;
}

function formatContextLines(contextLines: ContextLine[], colors: chalk.Chalk): string[] {
  const output: string[] = [];
  if (contextLines.length === 0) return output;

  const maxLineNumber = Math.max(...contextLines.map((item) => item.line));
  const lineNumPadding = String(maxLineNumber).length;

  for (const { line, content, isError, column } of contextLines) {
    const lineNumStr = String(line).padStart(lineNumPadding, " ");

    if (!isError) {
      output.push(` ${colors.gray(lineNumStr)} | ${colors.gray(content)}`);
      continue;
    }

    output.push(` ${colors.magenta(lineNumStr)} | ${content}`);
    if (column && column > 0) {
      output.push(" ".repeat(lineNumPadding + 3) + " ".repeat(column - 1) + colors.red.bold("^"));
    }
  }

  return output;
}

function loadContextLines(error: TranspilerError): { lines: ContextLine[]; note?: string } {
  if (error.contextLines.length > 0) return { lines: error.contextLines };

  const { filePath, line, column } = error.sourceLocation;
  if (!filePath || !line) return { lines: [] };

  try {
    const source = readFileSync(filePath, "utf8");
    return { lines: extractContextLinesFromSource(source, line, column) };
  } catch (readError) {
    logger.debug(`Could not load context for ${filePath}: ${getErrorMessage(readError)}`, "error");
    return { lines: [], note: `Could not read source file: ${filePath}` };
  }
}

/**
 * Render an error for the terminal: header, source excerpt, location and suggestion
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const colors = new chalk.Instance({ level: options.color === false ? 0 : 1 });

  if (!(error instanceof TranspilerError)) {
    return `${colors.red.bold("Error:")} ${formatErrorMessage(error)}`;
  }

  const output: string[] = [];
  const message = stripErrorCodeFromMessage(error.message)
    .replace(/\s+at\s+\S+:\d+:\d+$/, "")
    .replace(/\s+at line \d+:\d+$/, "");

  output.push(
    error.code
      ? `${colors.red.bold(`error[${formatErrorCode(error.code)}]:`)} ${message}`
      : `${colors.red.bold(`${error.errorType}:`)} ${message}`,
  );

  const context = loadContextLines(error);
  if (context.lines.length > 0) {
    output.push("");
    output.push(...formatContextLines(context.lines, colors));
  } else if (context.note) {
    output.push("");
    output.push(colors.gray(context.note));
  }

  const { filePath, line, column } = error.sourceLocation;
  if (filePath || line) {
    output.push("");
    const where = filePath ? `${filePath}:${line ?? 1}:${column ?? 1}` : `line ${line}:${column ?? 1}`;
    output.push(`${colors.magenta.bold("Where:")} ${where}`);
  }

  const suggestion = error.getSuggestion();
  if (suggestion) {
    output.push(colors.cyan(`Suggestion: ${suggestion}`));
  }

  if (options.debug && error.code) {
    const causes = getErrorCauses(error.code);
    if (causes.length > 0) output.push(colors.gray(`Common causes: ${causes.join("; ")}`));
  }

  if (options.debug && error.stack) {
    output.push("");
    output.push(colors.gray(error.stack));
  }

  return output.join("\n");
}

// -----------------------------------------------------------------------------
// Error reporter
// -----------------------------------------------------------------------------

export class ErrorReporter {
  private logger: Logger;
  private reported = new WeakSet<object>();

  constructor(reporterLogger?: Logger) {
    this.logger = reporterLogger ?? logger;
  }

  /**
   * Print an error once; repeated reports of the same error object are ignored
   */
  reportError(error: unknown, options: FormatErrorOptions = {}): void {
    if (typeof error === "object" && error !== null) {
      if (this.reported.has(error)) return;
      this.reported.add(error);
    }
    console.error(formatError(error, options));
    if (error instanceof TranspilerError) {
      this.logger.debug(error.getSummary(), "error");
    }
  }
}
