import { describe, it, expect } from "vitest";

import { extractClasses, extractFunctions, extractImports } from "../src/analyzers/structure";

describe("extractFunctions", () => {
  const source = [
    "def simple_func():",
    "    pass",
    "",
    "async def async_func(param1, param2):",
    "    '''Async function with parameters.'''",
    "    return param1 + param2",
    "",
    "def func_with_docstring():",
    '    """This function has a docstring."""',
    "    return True",
    "",
  ].join("\n");

  it("lists every function with its line", () => {
    expect(extractFunctions(source).map((fn) => [fn.name, fn.line])).toEqual([
      ["simple_func", 1],
      ["async_func", 4],
      ["func_with_docstring", 8],
    ]);
  });

  it("reads parameters, async-ness and docstrings", () => {
    const [simple, asyncFn, documented] = extractFunctions(source);
    expect(simple).toEqual({ name: "simple_func", line: 1, args: [], docstring: null, isAsync: false });
    expect(asyncFn).toEqual({
      name: "async_func",
      line: 4,
      args: ["param1", "param2"],
      docstring: "Async function with parameters.",
      isAsync: true,
    });
    expect(documented?.docstring).toBe("This function has a docstring.");
  });

  it("skips default values when listing parameters", () => {
    const [fn] = extractFunctions("def connect(host, port=5432, timeout=None):\n    pass\n");
    expect(fn?.args).toEqual(["host", "port", "timeout"]);
  });

  it("cleans the indentation of multi-line docstrings", () => {
    const [fn] = extractFunctions('def f():\n    """Summary.\n\n    Details here.\n    """\n    return 1\n');
    expect(fn?.docstring).toBe("Summary.\n\nDetails here.");
  });

  it("returns nothing for code that does not parse", () => {
    expect(extractFunctions("def broken(:\n")).toEqual([]);
  });
});

describe("extractClasses", () => {
  const source = [
    "class SimpleClass:",
    "    pass",
    "",
    "class ComplexClass(BaseClass):",
    '    """A complex class."""',
    "",
    "    def method1(self):",
    "        pass",
    "",
    "    async def async_method(self):",
    "        pass",
    "",
  ].join("\n");

  it("reads names, bases, methods and docstrings", () => {
    expect(extractClasses(source)).toEqual([
      { name: "SimpleClass", line: 1, bases: [], methods: [], docstring: null },
      {
        name: "ComplexClass",
        line: 4,
        bases: ["BaseClass"],
        methods: [
          { name: "method1", line: 7, isAsync: false },
          { name: "async_method", line: 10, isAsync: true },
        ],
        docstring: "A complex class.",
      },
    ]);
  });

  it("leaves keyword arguments out of the bases", () => {
    const [cls] = extractClasses("class Meta(Base, Mixin, metaclass=ABCMeta):\n    pass\n");
    expect(cls?.bases).toEqual(["Base", "Mixin"]);
  });

  it("includes decorated methods", () => {
    const [cls] = extractClasses("class A:\n    @property\n    def value(self):\n        return 1\n");
    expect(cls?.methods.map((method) => method.name)).toEqual(["value"]);
  });
});

describe("extractImports", () => {
  it("separates plain and from imports", () => {
    const source = [
      "import os",
      "import sys as system",
      "from pathlib import Path",
      "from collections import defaultdict, Counter",
      "from .local import helper",
      "",
    ].join("\n");

    expect(extractImports(source)).toEqual({
      imports: [
        { module: "os", alias: null, line: 1 },
        { module: "sys", alias: "system", line: 2 },
      ],
      fromImports: [
        { module: "pathlib", name: "Path", alias: null, line: 3, level: 0 },
        { module: "collections", name: "defaultdict", alias: null, line: 4, level: 0 },
        { module: "collections", name: "Counter", alias: null, line: 4, level: 0 },
        { module: ".local", name: "helper", alias: null, line: 5, level: 1 },
      ],
    });
  });

  it("handles parenthesized lists and relative levels", () => {
    const source = [
      "from package.subpackage import (",
      "    module1,",
      "    module2 as mod2,",
      ")",
      "from ..parent import sibling",
      "import package.deeply.nested.module",
      "",
    ].join("\n");

    const summary = extractImports(source);
    expect(summary.imports).toEqual([{ module: "package.deeply.nested.module", alias: null, line: 6 }]);
    expect(summary.fromImports).toEqual([
      { module: "package.subpackage", name: "module1", alias: null, line: 1, level: 0 },
      { module: "package.subpackage", name: "module2", alias: "mod2", line: 1, level: 0 },
      { module: "..parent", name: "sibling", alias: null, line: 5, level: 2 },
    ]);
  });
});
