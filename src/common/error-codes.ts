/**
 * Standardized error codes
 *
 * Codes render as SP<number>:
 * - 1000-1999: Parse errors (tokenizer and parser)
 * - 3000-3999: Configuration errors
 * - 6000-6999: Code generation errors
 */

export enum ErrorCode {
  // ============================================================================
  // Parse Errors (1000-1999)
  // ============================================================================

  /** Unclosed bracket, paren or brace */
  UNCLOSED_BRACKET = 1001,

  /** String literal missing its closing quote */
  UNTERMINATED_STRING = 1002,

  /** Unexpected token in input */
  UNEXPECTED_TOKEN = 1003,

  /** Unexpected end of file */
  UNEXPECTED_EOF = 1004,

  /** Invalid syntax - general parse error */
  INVALID_SYNTAX = 1005,

  /** Character that starts no token */
  INVALID_CHARACTER = 1007,

  /** Dedent to a column that matches no enclosing block */
  INCONSISTENT_INDENTATION = 1008,

  /** Left-hand side that cannot be assigned to */
  INVALID_ASSIGNMENT_TARGET = 1009,

  /** Source construct outside the supported subset */
  UNSUPPORTED_SYNTAX = 1010,

  /** Malformed numeric literal */
  INVALID_NUMBER = 1011,

  // ============================================================================
  // Configuration Errors (3000-3999)
  // ============================================================================

  /** Key not present in the configuration schema */
  UNKNOWN_CONFIG_KEY = 3001,

  /** Value of the wrong type or out of range */
  INVALID_CONFIG_VALUE = 3002,

  /** Config file missing or not valid JSON */
  CONFIG_FILE_UNREADABLE = 3003,

  // ============================================================================
  // Code Generation Errors (6000-6999)
  // ============================================================================

  /** AST node kind the generators do not handle */
  UNSUPPORTED_NODE = 6001,

  /** Assignment shape the generators do not handle */
  INVALID_ASSIGNMENT = 6002,

  /** break/continue with no enclosing loop */
  LOOP_CONTROL_OUTSIDE_LOOP = 6003,

  /** return at module level */
  RETURN_OUTSIDE_FUNCTION = 6004,

  /** Augmented assignment to a name never assigned */
  UNDECLARED_VARIABLE = 6005,

  /** range() called with the wrong number of arguments */
  INVALID_RANGE_CALL = 6006,

  /** def inside def */
  NESTED_FUNCTION = 6007,

  /** Parameter name repeated in one def */
  DUPLICATE_PARAMETER = 6008,

  /** Source map could not be produced */
  SOURCEMAP_GENERATION_FAILED = 6009,

  /** Call whose callee is neither a name nor an attribute */
  UNSUPPORTED_CALLEE = 6010,

  /** Scope stack misuse inside the generator */
  SCOPE_UNDERFLOW = 6011,

  /** Integer literal with no C++ int representation */
  INT_LITERAL_OUT_OF_RANGE = 6012,

  /** Generic code generation failure */
  CODEGEN_FAILED = 6099,
}

/**
 * Description, causes and fixes shown alongside an error
 */
interface ErrorInfo {
  description: string;
  causes: string[];
  fixes: string[];
}

const ERROR_INFO: Record<ErrorCode, ErrorInfo> = {
  [ErrorCode.UNCLOSED_BRACKET]: {
    description: "A bracket, parenthesis or brace is never closed.",
    causes: ["Missing closing ')' ']' or '}'", "Nested brackets are unbalanced"],
    fixes: ["Add the missing closing bracket"],
  },
  [ErrorCode.UNTERMINATED_STRING]: {
    description: "A string literal is missing its closing quote.",
    causes: ["Closing quote forgotten", "Unescaped quote inside the string"],
    fixes: [
      "Add the closing quote to complete the string",
      "Escape internal quotes with a backslash",
    ],
  },
  [ErrorCode.UNEXPECTED_TOKEN]: {
    description: "A token appeared where the grammar does not allow it.",
    causes: ["Typo or missing operator", "Missing ':' after a compound statement header"],
    fixes: ["Check the syntax near this location"],
  },
  [ErrorCode.UNEXPECTED_EOF]: {
    description: "The input ended in the middle of a construct.",
    causes: ["Unclosed bracket", "Compound statement with no body"],
    fixes: ["Complete the unfinished statement or expression"],
  },
  [ErrorCode.INVALID_SYNTAX]: {
    description: "The input does not match the grammar.",
    causes: ["Malformed statement or expression"],
    fixes: ["Check the syntax near this location"],
  },
  [ErrorCode.INVALID_CHARACTER]: {
    description: "A character that cannot start any token.",
    causes: ["Stray symbol such as '$' or '?'"],
    fixes: ["Remove the character or place it inside a string"],
  },
  [ErrorCode.INCONSISTENT_INDENTATION]: {
    description: "A dedent does not match any enclosing indentation level.",
    causes: ["Mixed tabs and spaces", "Block indented by an odd amount"],
    fixes: ["Indent every line of a block by the same amount"],
  },
  [ErrorCode.INVALID_ASSIGNMENT_TARGET]: {
    description: "The left-hand side of an assignment cannot be assigned to.",
    causes: ["Assigning to a literal, call or operator expression"],
    fixes: ["Assign to a name, subscript, attribute or tuple of those"],
  },
  [ErrorCode.UNSUPPORTED_SYNTAX]: {
    description: "The construct is outside the supported Python subset.",
    causes: ["Chained comparison", "Keyword not supported by the transpiler"],
    fixes: ["Rewrite the construct using supported syntax"],
  },
  [ErrorCode.INVALID_NUMBER]: {
    description: "A numeric literal is malformed.",
    causes: ["Digits invalid for the base", "Dangling exponent or separator"],
    fixes: ["Fix the number literal"],
  },
  [ErrorCode.UNKNOWN_CONFIG_KEY]: {
    description: "The configuration contains an unknown key.",
    causes: ["Misspelled option name"],
    fixes: ["Remove the key or correct its spelling"],
  },
  [ErrorCode.INVALID_CONFIG_VALUE]: {
    description: "A configuration value has the wrong type or range.",
    causes: ["String given where a number is expected", "Negative indent"],
    fixes: ["Use a value of the documented type"],
  },
  [ErrorCode.CONFIG_FILE_UNREADABLE]: {
    description: "The configuration file could not be read.",
    causes: ["File does not exist", "File is not valid JSON"],
    fixes: ["Check the path and the JSON syntax"],
  },
  [ErrorCode.UNSUPPORTED_NODE]: {
    description: "The code generator has no lowering for this node.",
    causes: ["Statement used where only expressions are allowed"],
    fixes: ["Simplify the construct"],
  },
  [ErrorCode.INVALID_ASSIGNMENT]: {
    description: "The assignment cannot be lowered.",
    causes: ["Augmented assignment to a tuple pattern"],
    fixes: ["Split the assignment into simple statements"],
  },
  [ErrorCode.LOOP_CONTROL_OUTSIDE_LOOP]: {
    description: "break or continue used outside any loop.",
    causes: ["Statement placed after the loop body ended"],
    fixes: ["Move the statement inside a for or while loop"],
  },
  [ErrorCode.RETURN_OUTSIDE_FUNCTION]: {
    description: "return used at module level.",
    causes: ["Statement dedented out of its function"],
    fixes: ["Move the return inside a function"],
  },
  [ErrorCode.UNDECLARED_VARIABLE]: {
    description: "An augmented assignment reads a variable never assigned.",
    causes: ["Variable used before its first assignment"],
    fixes: ["Assign the variable before updating it"],
  },
  [ErrorCode.INVALID_RANGE_CALL]: {
    description: "range() takes one to three arguments.",
    causes: ["range() called with no arguments or more than three"],
    fixes: ["Pass stop, start and stop, or start, stop and step"],
  },
  [ErrorCode.NESTED_FUNCTION]: {
    description: "Functions can only be defined at module level.",
    causes: ["def inside another def or inside a block"],
    fixes: ["Move the function to module level"],
  },
  [ErrorCode.DUPLICATE_PARAMETER]: {
    description: "A parameter name is repeated.",
    causes: ["Copy-paste in the parameter list"],
    fixes: ["Give each parameter a distinct name"],
  },
  [ErrorCode.SOURCEMAP_GENERATION_FAILED]: {
    description: "The source map could not be produced.",
    causes: ["Mapping outside the generated code"],
    fixes: ["Transpile without --source-map"],
  },
  [ErrorCode.UNSUPPORTED_CALLEE]: {
    description: "Only names and attributes can be called.",
    causes: ["Calling the result of a call or subscript"],
    fixes: ["Bind the callee to a function name first"],
  },
  [ErrorCode.SCOPE_UNDERFLOW]: {
    description: "The scope stack was popped past the global scope.",
    causes: ["Unbalanced scope handling in the generator"],
    fixes: ["Report the input that triggers this"],
  },
  [ErrorCode.INT_LITERAL_OUT_OF_RANGE]: {
    description: "Integer literals must fit in a C++ int.",
    causes: ["Literal larger than 2147483647"],
    fixes: ["Use a float literal or compute the value at run time"],
  },
  [ErrorCode.CODEGEN_FAILED]: {
    description: "Code generation failed.",
    causes: ["Construct the generator cannot lower"],
    fixes: ["Simplify the code near this location"],
  },
};

/**
 * Format error code for display
 *
 * @example
 * formatErrorCode(ErrorCode.UNEXPECTED_TOKEN) // "SP1003"
 */
export function formatErrorCode(code: ErrorCode): string {
  return `SP${code}`;
}

export function getErrorCauses(code: ErrorCode): string[] {
  return ERROR_INFO[code]?.causes ?? [];
}

export function getErrorDescription(code: ErrorCode): string {
  return ERROR_INFO[code]?.description ?? "An error occurred.";
}

export function getErrorFixes(code: ErrorCode): string[] {
  return ERROR_INFO[code]?.fixes ?? [];
}
