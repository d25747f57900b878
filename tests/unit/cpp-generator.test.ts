import { expect, test } from "vitest";
import { generate, parseSource, transpile } from "../../src/transpiler/index.ts";
import { ScopeTracker } from "../../src/transpiler/scope_table.ts";
import { py } from "./_shared/helpers.ts";

test("Generator: whole program", () => {
  const source = py(
    "def total(xs):",
    "    s = 0",
    "    for x in xs:",
    "        s += x",
    "    return s",
    "",
    "nums = [1, 2, 3]",
    "print(total(nums))",
  );
  expect(generate(parseSource(source))).toBe(
    [
      "#include <cmath>",
      '#include "builtins.hpp"',
      "",
      "DynamicType _fn_total(DynamicType xs);",
      "",
      "DynamicType _fn_total(DynamicType xs) {",
      "    DynamicType s = DynamicType(0);",
      "    DynamicType x;",
      "    DynamicType _iter_0 = xs;",
      "    for (const DynamicType& _item_0 : (_iter_0).getList()) {",
      "        x = _item_0;",
      "        s = (s) + (x);",
      "    }",
      "    return s;",
      "}",
      "",
      "int main() {",
      "    DynamicType nums = DynamicType(std::vector<DynamicType>{DynamicType(1), DynamicType(2), DynamicType(3)});",
      "    print(_fn_total(nums));",
      "    return 0;",
      "}",
      "",
    ].join("\n"),
  );
});

test("Generator: a module without functions has no prototype section", () => {
  expect(generate(parseSource("print(1)\n"))).toBe(
    '#include <cmath>\n#include "builtins.hpp"\n\nint main() {\n    print(DynamicType(1));\n    return 0;\n}\n',
  );
});

test("Generator: an empty module still has an entry point", () => {
  expect(generate(parseSource(""))).toBe(
    '#include <cmath>\n#include "builtins.hpp"\n\nint main() {\n    return 0;\n}\n',
  );
});

test("Generator: helper counters restart for every call", () => {
  const module = parseSource(py("a, b = 1, 2"));
  expect(generate(module)).toBe(generate(module));
  expect(generate(module)).toContain("_unpack_0");
});

test("Generator: a reused scope tracker is reset first", () => {
  const scope = new ScopeTracker();
  scope.declare("x");
  expect(generate(parseSource("x = 1\n"), { scope })).toContain("    DynamicType x = DynamicType(1);");
  expect(scope.depth).toBe(1);
});

test("Generator: async transpile resolves to the same code", async () => {
  const { code } = await transpile("print(1)\n");
  expect(code).toBe(generate(parseSource("print(1)\n")));
});
