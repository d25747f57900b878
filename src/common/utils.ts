// src/common/utils.ts

export function isObjectValue(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract a printable message from anything that was thrown.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (isObjectValue(error) && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}

/**
 * Split source text into lines, accepting both LF and CRLF endings.
 */
export function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}

export function pluralize(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? "" : "s"}`;
}
