// src/transpiler/scope_table.ts
// Scope stack deciding between "declare" and "reassign" for generated assignments

import { globalLogger as logger } from "../logger.ts";
import { ScopeError } from "../common/error.ts";

export type DeclarationKind = "variable" | "parameter" | "loop-target";

export type ScopeKind = "global" | "module" | "function" | "block";

interface ScopeFrame {
  readonly kind: ScopeKind;
  readonly names: Map<string, DeclarationKind>;
}

/**
 * Stack of name tables, innermost last.
 *
 * One instance is shared by every generator during a single `generate()` call.
 * The bottom frame is the global scope and can only be removed by `reset()`.
 */
export class ScopeTracker {
  private frames: ScopeFrame[] = [];

  constructor() {
    this.reset();
  }

  /** Number of tables on the stack, including the global one */
  get depth(): number {
    return this.frames.length;
  }

  reset(): void {
    this.frames = [{ kind: "global", names: new Map() }];
    logger.debug("Scope stack reset", "scope");
  }

  enterScope(kind: ScopeKind = "block"): void {
    this.frames.push({ kind, names: new Map() });
    logger.debug(`Entered ${kind} scope (depth ${this.frames.length})`, "scope");
  }

  /**
   * Pop the innermost table. Popping the global table is a generator bug.
   */
  exitScope(): void {
    if (this.frames.length <= 1) {
      throw new ScopeError("Cannot exit global scope");
    }
    const frame = this.frames.pop();
    logger.debug(`Exited ${frame?.kind ?? "unknown"} scope (depth ${this.frames.length})`, "scope");
  }

  push(kind: ScopeKind = "block"): void {
    this.enterScope(kind);
  }

  /**
   * Like `exitScope`, but a no-op at global level
   */
  pop(): void {
    if (this.frames.length <= 1) {
      logger.debug("Ignoring pop of global scope", "scope");
      return;
    }
    this.exitScope();
  }

  declare(name: string, kind: DeclarationKind = "variable"): void {
    const frame = this.currentFrame();
    if (!frame.names.has(name)) {
      frame.names.set(name, kind);
      logger.debug(`Declared ${kind} '${name}' in ${frame.kind} scope`, "scope");
    }
  }

  exists(name: string): boolean {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (this.frames[i].names.has(name)) return true;
    }
    return false;
  }

  existsInCurrentScope(name: string): boolean {
    return this.currentFrame().names.has(name);
  }

  /**
   * Kind recorded at the innermost declaration of a name
   */
  resolve(name: string): DeclarationKind | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const kind = this.frames[i].names.get(name);
      if (kind) return kind;
    }
    return undefined;
  }

  currentScope(): ReadonlySet<string> {
    return new Set(this.currentFrame().names.keys());
  }

  allScopes(): ReadonlySet<string>[] {
    return this.frames.map((frame) => new Set(frame.names.keys()));
  }

  /**
   * Run `fn` inside a fresh scope, popping it even when `fn` throws
   */
  withScope<T>(kind: ScopeKind, fn: () => T): T {
    this.enterScope(kind);
    try {
      return fn();
    } finally {
      this.exitScope();
    }
  }

  private currentFrame(): ScopeFrame {
    return this.frames[this.frames.length - 1];
  }
}
