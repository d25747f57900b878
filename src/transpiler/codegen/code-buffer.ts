/**
 * CodeBuffer - line-oriented C++ emission with source map support.
 *
 * Generators hand it whole lines; the buffer owns indentation and records
 * which Python line produced each emitted C++ line.
 */

import type { Position } from "../type/py_ast.ts";

/**
 * A single source map mapping entry.
 */
export interface SourceMapping {
  generated: { line: number; column: number };
  original: { line: number; column: number };
  source: string;
  /** Original identifier name, when the line introduces one */
  name: string | null;
}

export interface CodeBufferOptions {
  /** Source file path recorded in mappings. Defaults to "input.py" */
  sourceFilePath?: string;
  /** Spaces per indentation level. Defaults to 4 */
  indentWidth?: number;
}

export interface CodeBufferResult {
  code: string;
  mappings: SourceMapping[];
}

export class CodeBuffer {
  private lines: string[] = [];
  private mappings: SourceMapping[] = [];
  private indentLevel = 0;
  readonly indentStr: string;
  private readonly sourceFilePath: string;

  constructor(options: CodeBufferOptions = {}) {
    this.sourceFilePath = options.sourceFilePath ?? "input.py";
    this.indentStr = " ".repeat(options.indentWidth ?? 4);
  }

  /**
   * Write one logical line at the current indentation.
   *
   * Text spanning several lines (a multiline collection literal) has every
   * physical line shifted by the current indentation, so nested output stays aligned.
   */
  writeLine(text = "", pos?: Position, name?: string): void {
    if (!text) {
      this.lines.push("");
      return;
    }

    const prefix = this.indentStr.repeat(this.indentLevel);
    if (pos) {
      this.mappings.push({
        generated: { line: this.lines.length + 1, column: prefix.length },
        original: { line: pos.line, column: Math.max(0, pos.column - 1) },
        source: this.sourceFilePath,
        name: name ?? null,
      });
    }

    for (const line of text.split("\n")) {
      this.lines.push(line ? prefix + line : "");
    }
  }

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    this.indentLevel = Math.max(0, this.indentLevel - 1);
  }

  /**
   * Run `fn` one level deeper, restoring the level even when it throws
   */
  withIndent<T>(fn: () => T): T {
    this.indent();
    try {
      return fn();
    } finally {
      this.dedent();
    }
  }

  getIndentLevel(): number {
    return this.indentLevel;
  }

  /** Number of lines written so far */
  get lineCount(): number {
    return this.lines.length;
  }

  /**
   * The generated code, newline-terminated, and its mappings
   */
  getResult(): CodeBufferResult {
    return {
      code: this.lines.length > 0 ? `${this.lines.join("\n")}\n` : "",
      mappings: this.mappings,
    };
  }
}
