import { expect, test } from "vitest";
import { escapeCppString, processEscapeSequences, utf8ByteLength } from "../../src/transpiler/utils/escape-sequences.ts";

test("Escapes: simple escapes are decoded", () => {
  expect(processEscapeSequences("a\\tb")).toBe("a\tb");
  expect(processEscapeSequences("line\\n")).toBe("line\n");
  expect(processEscapeSequences("\\\\")).toBe("\\");
  expect(processEscapeSequences("it\\'s")).toBe("it's");
});

test("Escapes: hex and unicode escapes", () => {
  expect(processEscapeSequences("\\x41")).toBe("A");
  expect(processEscapeSequences("\\u00e9")).toBe("é");
  expect(processEscapeSequences("\\U0001F600")).toBe("😀");
});

test("Escapes: unknown escapes keep the backslash", () => {
  expect(processEscapeSequences("\\q")).toBe("\\q");
  expect(processEscapeSequences("\\xZZ")).toBe("\\xZZ");
});

test("Escapes: backslash-newline joins lines", () => {
  expect(processEscapeSequences("a\\\nb")).toBe("ab");
});

test("Escapes: C++ literal encoding", () => {
  expect(escapeCppString('a"b\\c\n')).toBe('a\\"b\\\\c\\n');
  expect(escapeCppString("\t\r")).toBe("\\t\\r");
  expect(escapeCppString("\x01")).toBe("\\001");
  expect(escapeCppString("é")).toBe("é");
});

test("Escapes: octal escapes take up to three digits", () => {
  expect(processEscapeSequences("\\101")).toBe("A");
  expect(processEscapeSequences("\\012x")).toBe("\nx");
  expect(processEscapeSequences("\\0")).toBe("\0");
  expect(processEscapeSequences("\\01234")).toBe("\n34");
  expect(processEscapeSequences("\\7z")).toBe("\x07z");
});

test("Escapes: 8 and 9 are not octal digits", () => {
  expect(processEscapeSequences("\\8")).toBe("\\8");
  expect(processEscapeSequences("\\18")).toBe("\x018");
});

test("Escapes: UTF-8 byte length", () => {
  expect(utf8ByteLength("a\0b")).toBe(3);
  expect(utf8ByteLength("é")).toBe(2);
});
