// compiler-context.ts - State shared by the C++ generators during one generate() call

import { DEFAULT_CONFIG, type TranspilerConfig } from "../common/config/types.ts";
import { CodeBuffer } from "./codegen/code-buffer.ts";
import { ScopeTracker } from "./scope_table.ts";
import type { Statement } from "./type/py_ast.ts";

/** Statement-list generator handed to the control-flow modules */
export type StatementsGenerator = (statements: readonly Statement[], ctx: GeneratorContext) => void;

export interface GeneratorContext {
  readonly config: TranspilerConfig;
  readonly scope: ScopeTracker;
  readonly buffer: CodeBuffer;
  /** User functions defined in the module, by Python name */
  readonly functions: Set<string>;
  /**
   * One entry per enclosing loop: the completion flag `break` must clear,
   * or null when the loop has no else clause
   */
  readonly loopFlags: (string | null)[];
  functionDepth: number;
  /** Counter behind every generated helper name (_unpack_N, _i_N, ...) */
  nextId: number;
  filePath?: string;
}

export interface GeneratorContextOptions {
  config?: Partial<TranspilerConfig>;
  scope?: ScopeTracker;
  filePath?: string;
}

export function createGeneratorContext(options: GeneratorContextOptions = {}): GeneratorContext {
  const config = { ...DEFAULT_CONFIG, ...options.config };
  return {
    config,
    scope: options.scope ?? new ScopeTracker(),
    buffer: new CodeBuffer({ sourceFilePath: options.filePath, indentWidth: config.indent }),
    functions: new Set(),
    loopFlags: [],
    functionDepth: 0,
    nextId: 0,
    filePath: options.filePath,
  };
}

/**
 * Reserve a fresh suffix for generated helper names
 */
export function uniqueId(ctx: GeneratorContext): number {
  return ctx.nextId++;
}

/**
 * Emit a `{ ... }` body one indentation level deeper.
 * Blocks share the scope of the enclosing function or entry point.
 */
export function emitBlockBody(ctx: GeneratorContext, emit: () => void): void {
  ctx.buffer.withIndent(emit);
}
