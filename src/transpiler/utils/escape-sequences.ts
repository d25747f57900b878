// src/transpiler/utils/escape-sequences.ts
// Decoding of Python string escapes and encoding for C++ string literals

/**
 * Python single-character escapes
 */
export const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  "n": "\n",
  "t": "\t",
  "r": "\r",
  "\\": "\\",
  '"': '"',
  "'": "'",
  "a": "\x07",
  "b": "\b",
  "f": "\f",
  "v": "\v",
};

export const HEX_ESCAPE_REGEX = /^[0-9a-fA-F]{2}$/;

export const UNICODE_ESCAPE_REGEX = /^[0-9a-fA-F]{4}$/;

export const UNICODE_LONG_ESCAPE_REGEX = /^[0-9a-fA-F]{8}$/;

/** Up to two further digits after the first of an octal escape */
export const OCTAL_ESCAPE_REGEX = /^[0-7]{0,2}/;

/**
 * Result of processing an escape sequence
 */
export interface EscapeResult {
  /** The resolved character(s) */
  value: string;
  /** Characters consumed after the escape character itself */
  consumed: number;
}

function processFixedHexEscape(content: string, length: number, pattern: RegExp): EscapeResult | null {
  const hex = content.slice(0, length);
  if (!pattern.test(hex)) return null;
  return { value: String.fromCodePoint(parseInt(hex, 16)), consumed: length };
}

/**
 * Resolve the escape whose character follows a backslash.
 * Unknown escapes keep the backslash, as Python does.
 */
export function processSingleEscape(escapeChar: string, content: string): EscapeResult {
  if (/^[0-7]$/.test(escapeChar)) {
    const rest = OCTAL_ESCAPE_REGEX.exec(content)?.[0] ?? "";
    return { value: String.fromCodePoint(parseInt(escapeChar + rest, 8)), consumed: rest.length };
  }

  if (escapeChar in SIMPLE_ESCAPES) {
    return { value: SIMPLE_ESCAPES[escapeChar], consumed: 0 };
  }

  const hexEscape = escapeChar === "x"
    ? processFixedHexEscape(content, 2, HEX_ESCAPE_REGEX)
    : escapeChar === "u"
    ? processFixedHexEscape(content, 4, UNICODE_ESCAPE_REGEX)
    : escapeChar === "U"
    ? processFixedHexEscape(content, 8, UNICODE_LONG_ESCAPE_REGEX)
    : null;

  return hexEscape ?? { value: `\\${escapeChar}`, consumed: 0 };
}

/**
 * Decode the body of a Python string literal (quotes already removed)
 */
export function processEscapeSequences(content: string): string {
  let result = "";
  let i = 0;

  while (i < content.length) {
    const char = content[i];
    if (char !== "\\" || i + 1 >= content.length) {
      result += char;
      i++;
      continue;
    }

    const escapeChar = content[i + 1];
    // backslash-newline continues the literal on the next line
    if (escapeChar === "\n") {
      i += 2;
      continue;
    }

    const escaped = processSingleEscape(escapeChar, content.slice(i + 2));
    result += escaped.value;
    i += 2 + escaped.consumed;
  }

  return result;
}

const CPP_ESCAPES: Readonly<Record<string, string>> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
};

/**
 * Length in bytes of the UTF-8 encoding the C++ literal ends up with
 */
export function utf8ByteLength(value: string): number {
  return new TextEncoder().encode(value).length;
}

/**
 * Escape a decoded string for use inside a C++ double-quoted literal.
 * Remaining control characters become three-digit octal escapes.
 */
export function escapeCppString(value: string): string {
  let result = "";
  for (const char of value) {
    const mapped = CPP_ESCAPES[char];
    if (mapped !== undefined) {
      result += mapped;
      continue;
    }
    const code = char.codePointAt(0) ?? 0;
    result += code < 0x20 || code === 0x7f ? `\\${code.toString(8).padStart(3, "0")}` : char;
  }
  return result;
}
