// Serpentine - ESM module entry
// Minimal API for transpiling a Python subset to C++

export {
  generate,
  generateWithMappings,
  parse,
  parseSource,
  transpile,
  transpileSync,
  type TranspileOptions,
  type TranspileResult,
} from "./src/transpiler/index.ts";

export { createTokenStream, tokenize, type Token, TokenType, type TokenStream } from "./src/transpiler/tokenizer/tokenizer.ts";
export * as ast from "./src/transpiler/type/py_ast.ts";
export { ScopeTracker } from "./src/transpiler/scope_table.ts";

export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
  type TranspilerConfig,
  validateValue,
} from "./src/common/config/index.ts";

export {
  CodeGenError,
  ConfigError,
  formatError,
  LoopControlError,
  ParseError,
  ScopeError,
  TranspilerError,
} from "./src/common/error.ts";
export { ErrorCode } from "./src/common/error-codes.ts";
export { globalLogger, Logger } from "./src/logger.ts";
