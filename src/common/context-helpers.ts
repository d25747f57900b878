// src/common/context-helpers.ts

import { splitLines } from "./utils.ts";

export interface ContextLine {
  line: number;
  content: string;
  isError: boolean;
  column?: number;
}

/**
 * Lines around an error position, 1-based, with the error line flagged.
 * Returns an empty list when the line lies outside the source.
 */
export function extractContextLinesFromSource(
  source: string,
  errorLine: number,
  errorColumn?: number,
  contextSize = 2,
): ContextLine[] {
  if (!source || errorLine <= 0 || !Number.isFinite(errorLine)) {
    return [];
  }

  const lines = splitLines(source);
  if (errorLine > lines.length) {
    return [];
  }

  const result: ContextLine[] = [];
  const startLine = Math.max(0, errorLine - contextSize - 1);
  const endLine = Math.min(lines.length - 1, errorLine - 1 + contextSize);

  for (let i = startLine; i <= endLine; i++) {
    const lineNumber = i + 1;
    const isErrorLine = lineNumber === errorLine;
    result.push({
      line: lineNumber,
      content: lines[i] ?? "",
      isError: isErrorLine,
      column: isErrorLine ? errorColumn : undefined,
    });
  }

  return result;
}
