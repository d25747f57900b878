import { expect, test } from "vitest";
import { CodeGenError } from "../../src/common/error.ts";
import { createGeneratorContext } from "../../src/transpiler/compiler-context.ts";
import { expr } from "./_shared/helpers.ts";

test("Expressions: literals wrap in DynamicType", () => {
  expect(expr("42")).toBe("DynamicType(42)");
  expect(expr("2.0")).toBe("DynamicType(2.0)");
  expect(expr("0.5")).toBe("DynamicType(0.5)");
  expect(expr("True")).toBe("DynamicType(true)");
  expect(expr("False")).toBe("DynamicType(false)");
  expect(expr("None")).toBe("DynamicType()");
});

test("Expressions: strings are escaped for C++", () => {
  expect(expr(`'say "hi"\\n'`)).toBe('DynamicType(std::string("say \\"hi\\"\\n"))');
});

test("Expressions: strings holding NUL pass their byte length", () => {
  expect(expr("'a\\0b'")).toBe('DynamicType(std::string("a\\000b", 3))');
  expect(expr("'\u00e9\\0'")).toBe('DynamicType(std::string("\u00e9\\000", 3))');
  expect(expr("'\\012x'")).toBe('DynamicType(std::string("\\nx"))');
});

test("Expressions: names pass through unless reserved in C++", () => {
  expect(expr("total")).toBe("total");
  expect(expr("double")).toBe("_v_double");
  expect(expr("__name__")).toBe('DynamicType(std::string("__main__"))');
});

test("Expressions: unary operators", () => {
  expect(expr("-x")).toBe("(DynamicType(0) - (x))");
  expect(expr("not x")).toBe("DynamicType(!(x).toBool())");
});

test("Expressions: not applies to its operand before comparing", () => {
  expect(expr("not a == b")).toBe("DynamicType((DynamicType(!(a).toBool())) == (b))");
});

test("Expressions: int literals must fit in a C++ int", () => {
  expect(expr("2147483647")).toBe("DynamicType(2147483647)");
  expect(expr("-7")).toBe("(DynamicType(0) - (DynamicType(7)))");
  expect(() => expr("2147483648")).toThrow("[SP6012] Integer literal 2147483648 does not fit in a C++ int");
  expect(() => expr("12345678901234567890")).toThrow("Integer literal 12345678901234567890 does not fit");
  expect(() => expr("9007199254740993")).toThrow("Integer literal 9007199254740993 does not fit");
  expect(() => expr("1000000000000000000000")).toThrow("Integer literal 1000000000000000000000 does not fit");
  expect(() => expr("0xFFFFFFFF")).toThrow("Integer literal 0xFFFFFFFF does not fit");
  expect(() => expr("[1, 4000000000]")).toThrow(CodeGenError);
});

test("Expressions: arithmetic operators", () => {
  expect(expr("a + b")).toBe("((a) + (b))");
  expect(expr("a % b")).toBe("((a) % (b))");
  expect(expr("a // b")).toBe("(a).floor_div(b)");
  expect(expr("a ** 2")).toBe("DynamicType(std::pow((a).toDouble(), (DynamicType(2)).toDouble()))");
  expect(expr("(a + b) * c")).toBe("((((a) + (b))) * (c))");
});

test("Expressions: logical operators go through toBool", () => {
  expect(expr("a and b")).toBe("DynamicType((a).toBool() && (b).toBool())");
  expect(expr("a or b")).toBe("DynamicType((a).toBool() || (b).toBool())");
});

test("Expressions: comparisons", () => {
  expect(expr("a == 1")).toBe("DynamicType((a) == (DynamicType(1)))");
  expect(expr("a <= b")).toBe("DynamicType((a) <= (b))");
  expect(expr("x in xs")).toBe("DynamicType((xs).contains(x))");
  expect(expr("x not in xs")).toBe("DynamicType(!(xs).contains(x))");
  expect(expr("a is None")).toBe("DynamicType((a) == (DynamicType()))");
  expect(expr("a is not None")).toBe("DynamicType((a) != (DynamicType()))");
});

test("Expressions: builtin and user calls", () => {
  expect(expr("print(x)")).toBe("print(x)");
  expect(expr("int(s)")).toBe("int_(s)");
  expect(expr("len(xs)")).toBe("len(xs)");
  expect(expr("foo(1)")).toBe("_fn_foo(DynamicType(1))");
});

test("Expressions: a user function shadows a builtin of the same name", () => {
  const ctx = createGeneratorContext();
  ctx.functions.add("len");
  expect(expr("len(xs)", ctx)).toBe("_fn_len(xs)");
});

test("Expressions: function prefix comes from config", () => {
  const ctx = createGeneratorContext({ config: { functionPrefix: "py_" } });
  expect(expr("foo()", ctx)).toBe("py_foo()");
});

test("Expressions: method calls", () => {
  expect(expr("xs.append(1)")).toBe("(xs).append(DynamicType(1))");
  expect(expr("s.discard(x)")).toBe("(s).remove(x)");
  expect(expr("xs.pop()")).toBe("(xs).removeAt(DynamicType(-1))");
  expect(expr("d.pop(k)")).toBe("(d).removeKey(k)");
  expect(expr("xs.slice(a, b)")).toBe("(xs).sublist(a, b)");
  expect(expr("s.upper()")).toBe("(s).upper()");
});

test("Expressions: only names and methods can be called", () => {
  expect(() => expr("xs[0](1)")).toThrow(CodeGenError);
  expect(() => expr("xs[0](1)")).toThrow("Only named functions and methods can be called, not Subscript");
});

test("Expressions: indexing and attributes", () => {
  expect(expr("xs[0]")).toBe("(xs)[DynamicType(0)]");
  expect(expr("p.x")).toBe("(p).x");
});

test("Expressions: slices", () => {
  expect(expr("xs[:]")).toBe("xs");
  expect(expr("xs[::1]")).toBe("xs");
  expect(expr("xs[1:3]")).toBe("(xs).sublist(DynamicType(1), DynamicType(3))");
  expect(expr("xs[1:]")).toBe("(xs).sublist(DynamicType(1), len(xs))");
  expect(expr("xs[::2]")).toBe("(xs).sublist(DynamicType(0), len(xs), DynamicType(2))");
});

test("Expressions: lists and tuples become vectors", () => {
  const vector = "DynamicType(std::vector<DynamicType>{DynamicType(1), DynamicType(2)})";
  expect(expr("[1, 2]")).toBe(vector);
  expect(expr("(1, 2)")).toBe(vector);
  expect(expr("[]")).toBe("DynamicType(std::vector<DynamicType>{})");
});

test("Expressions: sets and dicts", () => {
  expect(expr("{1, 2}")).toBe("DynamicType(std::unordered_set<DynamicType>{DynamicType(1), DynamicType(2)})");
  expect(expr("{'a': 1}")).toBe(
    'DynamicType(std::map<std::string, DynamicType>{{(DynamicType(std::string("a"))).toString(), DynamicType(1)}})',
  );
  expect(expr("{}")).toBe("DynamicType(std::map<std::string, DynamicType>{})");
});

test("Expressions: long collections break across lines", () => {
  expect(expr("[1, 2, 3, 4]")).toBe(
    "DynamicType(std::vector<DynamicType>{\n" +
      "    DynamicType(1),\n" +
      "    DynamicType(2),\n" +
      "    DynamicType(3),\n" +
      "    DynamicType(4)\n" +
      "})",
  );
});

test("Expressions: inline limit comes from config", () => {
  const ctx = createGeneratorContext({ config: { collectionInlineLimit: 1, indent: 2 } });
  expect(expr("[1, 2]", ctx)).toBe(
    "DynamicType(std::vector<DynamicType>{\n  DynamicType(1),\n  DynamicType(2)\n})",
  );
});
