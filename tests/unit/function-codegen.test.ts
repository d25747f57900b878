import { expect, test } from "vitest";
import { CodeGenError } from "../../src/common/error.ts";
import { ErrorCode } from "../../src/common/error-codes.ts";
import { mainBody, py, transpile } from "./_shared/helpers.ts";

test("Functions: prototype, definition and empty main", () => {
  expect(transpile(py("def add(a, b):", "    return a + b"))).toBe(
    [
      "#include <cmath>",
      '#include "builtins.hpp"',
      "",
      "DynamicType _fn_add(DynamicType a, DynamicType b);",
      "",
      "DynamicType _fn_add(DynamicType a, DynamicType b) {",
      "    return ((a) + (b));",
      "}",
      "",
      "int main() {",
      "    return 0;",
      "}",
      "",
    ].join("\n"),
  );
});

test("Functions: body without return falls through to None", () => {
  const lines = transpile(py("def greet():", "    print(1)")).split("\n");
  expect(lines.slice(5, 9)).toEqual([
    "DynamicType _fn_greet() {",
    "    print(DynamicType(1));",
    "    return DynamicType();",
    "}",
  ]);
});

test("Functions: bare return yields None", () => {
  const lines = transpile(py("def stop():", "    return")).split("\n");
  expect(lines[6]).toBe("    return DynamicType();");
  expect(lines[7]).toBe("}");
});

test("Functions: parameters are reassigned, not redeclared", () => {
  const lines = transpile(py("def f(n):", "    n = n - 1", "    return n")).split("\n");
  expect(lines.slice(6, 8)).toEqual([
    "    n = ((n) - (DynamicType(1)));",
    "    return n;",
  ]);
});

test("Functions: module variables are not visible inside functions", () => {
  const lines = transpile(py("x = 1", "def f():", "    x = 2")).split("\n");
  expect(lines[6]).toBe("    DynamicType x = DynamicType(2);");
});

test("Functions: a parameter shadowing a module variable is not redeclared", () => {
  const lines = transpile(py("x = 1", "def f(x):", "    return x")).split("\n");
  expect(lines.slice(5, 8)).toEqual([
    "DynamicType _fn_f(DynamicType x) {",
    "    return x;",
    "}",
  ]);
  expect(mainBody(py("x = 1", "def f(x):", "    return x"))).toEqual(["DynamicType x = DynamicType(1);"]);
});

test("Functions: names bound in a loop stay visible for the return", () => {
  const lines = transpile(py("def last(xs):", "    for v in xs:", "        pass", "    return v")).split("\n");
  expect(lines.slice(6, 12)).toEqual([
    "    DynamicType v;",
    "    DynamicType _iter_0 = xs;",
    "    for (const DynamicType& _item_0 : (_iter_0).getList()) {",
    "        v = _item_0;",
    "        // pass",
    "    }",
  ]);
  expect(lines[12]).toBe("    return v;");
});

test("Functions: reserved parameter names are prefixed", () => {
  const lines = transpile(py("def f(int):", "    return int")).split("\n");
  expect(lines[3]).toBe("DynamicType _fn_f(DynamicType _v_int);");
  expect(lines[6]).toBe("    return _v_int;");
});

test("Functions: recursive fib", () => {
  const code = transpile(py(
    "def fib(n):",
    "    if n < 2:",
    "        return n",
    "    return fib(n - 1) + fib(n - 2)",
    "",
    "print(fib(10))",
  ));
  const lines = code.split("\n");
  expect(lines.slice(5, 11)).toEqual([
    "DynamicType _fn_fib(DynamicType n) {",
    "    if ((DynamicType((n) < (DynamicType(2)))).toBool()) {",
    "        return n;",
    "    }",
    "    return ((_fn_fib(((n) - (DynamicType(1))))) + (_fn_fib(((n) - (DynamicType(2))))));",
    "}",
  ]);
  expect(lines.slice(12, 16)).toEqual([
    "int main() {",
    "    print(_fn_fib(DynamicType(10)));",
    "    return 0;",
    "}",
  ]);
});

test("Functions: an uncalled main is called from the entry point", () => {
  expect(mainBody(py("def main():", "    pass"))).toEqual(["_fn_main();"]);
});

test("Functions: main call synthesis can be turned off", () => {
  expect(mainBody(py("def main():", "    pass"), { config: { synthesizeMainCall: false } })).toEqual([]);
});

test("Functions: the main guard is unwrapped", () => {
  const body = ["def main():", "    pass", ""];
  expect(mainBody(py(...body, 'if __name__ == "__main__":', "    main()"))).toEqual(["_fn_main();"]);
  expect(mainBody(py(...body, 'if "__main__" == __name__:', "    main()"))).toEqual(["_fn_main();"]);
});

test("Functions: definition order does not matter", () => {
  const lines = transpile(py("def a():", "    return b()", "def b():", "    return 1")).split("\n");
  expect(lines.slice(3, 5)).toEqual([
    "DynamicType _fn_a();",
    "DynamicType _fn_b();",
  ]);
  expect(lines[7]).toBe("    return _fn_b();");
});

test("Functions: forward declarations can be turned off", () => {
  const lines = transpile(py("def add(a, b):", "    return a + b"), {
    config: { forwardDeclarations: false },
  }).split("\n");
  expect(lines[3]).toBe("DynamicType _fn_add(DynamicType a, DynamicType b) {");
});

test("Functions: prefix comes from config", () => {
  const code = transpile(py("def add(a, b):", "    return a + b", "print(add(1, 2))"), {
    config: { functionPrefix: "py_" },
  });
  expect(code).toContain("DynamicType py_add(DynamicType a, DynamicType b) {");
  expect(mainBody(py("def add(a, b):", "    return a + b", "print(add(1, 2))"), {
    config: { functionPrefix: "py_" },
  })).toEqual(["print(py_add(DynamicType(1), DynamicType(2)));"]);
});

test("Functions: duplicate parameters", () => {
  expect(() => transpile(py("def f(a, a):", "    pass"))).toThrow("Duplicate parameter 'a' in function 'f'");
});

test("Functions: nested definitions are rejected", () => {
  let caught: unknown;
  try {
    transpile(py("def f():", "    def g():", "        pass"));
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(CodeGenError);
  if (!(caught instanceof CodeGenError)) return;
  expect(caught.code).toBe(ErrorCode.NESTED_FUNCTION);
  expect(caught.message).toContain("Nested function 'g' is not supported");
});

test("Functions: definitions inside blocks are rejected", () => {
  expect(() => transpile(py("if x:", "    def f():", "        pass"))).toThrow(
    "Function 'f' must be defined at module level",
  );
});

test("Functions: redefinition is rejected", () => {
  expect(() => transpile(py("def f():", "    pass", "def f():", "    pass"))).toThrow(
    "Function 'f' is defined more than once",
  );
});
