import { describe, it, expect } from "vitest";

import {
  analyzeComplexity,
  averageOf,
  countViolations,
  heuristicComplexityAnalysis,
  parseRadonOutput,
} from "../src/analyzers/complexity";
import { ToolInvocationError } from "../src/analyzers/tools";
import { createFakeRunner, toolResult } from "./helpers/fakeRunner";

function complexityOf(source: string): number[] {
  return heuristicComplexityAnalysis(source).functionMetrics.map((metric) => metric.cyclomaticComplexity);
}

describe("heuristicComplexityAnalysis", () => {
  it("gives a straight-line function complexity 1", () => {
    const report = heuristicComplexityAnalysis("def f():\n    return 1\n");
    expect(report).toEqual({
      functionMetrics: [{ name: "f", cyclomaticComplexity: 1, lineNumber: 1 }],
      averageComplexity: 1,
      source: "heuristic",
    });
  });

  it("counts if and elif branches", () => {
    const source = [
      "def grade(x):",
      "    if x > 90:",
      '        return "A"',
      "    elif x > 80:",
      '        return "B"',
      "    else:",
      '        return "C"',
      "",
    ].join("\n");
    expect(complexityOf(source)).toEqual([3]);
  });

  it("counts loops and exception handlers", () => {
    const source = [
      "def work(items):",
      "    for item in items:",
      "        while item:",
      "            item -= 1",
      "    try:",
      "        pass",
      "    except ValueError:",
      "        pass",
      "    except:",
      "        pass",
      "",
    ].join("\n");
    expect(complexityOf(source)).toEqual([5]);
  });

  it("counts every boolean operator", () => {
    expect(complexityOf("def check(a, b, c):\n    return a and b and c or a\n")).toEqual([4]);
  });

  it("counts comprehension clauses and filters", () => {
    expect(complexityOf("def evens(rows):\n    return [x for row in rows for x in row if x % 2 == 0]\n")).toEqual([4]);
  });

  it("counts generator arguments", () => {
    expect(complexityOf("def total(xs):\n    return sum(x for x in xs if x)\n")).toEqual([3]);
  });

  it("does not count a conditional expression", () => {
    expect(complexityOf("def pick(a):\n    return 1 if a else 2\n")).toEqual([1]);
  });

  it("reports nested functions separately in document order", () => {
    const source = [
      "def outer(x):",
      "    def inner(y):",
      "        if y:",
      "            return 1",
      "        return 0",
      "    return inner(x)",
      "",
    ].join("\n");
    expect(heuristicComplexityAnalysis(source).functionMetrics).toEqual([
      { name: "outer", cyclomaticComplexity: 2, lineNumber: 1 },
      { name: "inner", cyclomaticComplexity: 2, lineNumber: 2 },
    ]);
  });

  it("includes methods and async functions", () => {
    const source = [
      "class Loader:",
      "    def load(self, path):",
      "        return path",
      "",
      "async def fetch(urls):",
      "    for url in urls:",
      "        await url",
      "",
    ].join("\n");
    expect(heuristicComplexityAnalysis(source).functionMetrics).toEqual([
      { name: "load", cyclomaticComplexity: 1, lineNumber: 2 },
      { name: "fetch", cyclomaticComplexity: 2, lineNumber: 5 },
    ]);
  });

  it("adds exactly one when a branch is added", () => {
    const one = "def f(a):\n    if a:\n        return 1\n    return 0\n";
    const two = "def f(a, b):\n    if a:\n        return 1\n    if b:\n        return 2\n    return 0\n";
    expect(complexityOf(two)[0]).toBe((complexityOf(one)[0] ?? 0) + 1);
  });

  it("averages to two decimals", () => {
    const source = "def a():\n    pass\n\ndef b():\n    pass\n\ndef c(x):\n    if x:\n        pass\n";
    expect(heuristicComplexityAnalysis(source).averageComplexity).toBe(1.33);
  });

  it("returns an empty report for code that does not parse", () => {
    expect(heuristicComplexityAnalysis("def broken(:\n")).toEqual({
      functionMetrics: [],
      averageComplexity: 0,
      source: "heuristic",
    });
  });

  it("returns an empty report when a dedent does not match", () => {
    expect(heuristicComplexityAnalysis("def f():\n    return 1\n  x = 2\n").functionMetrics).toEqual([]);
  });

  it("returns an empty report for a file without functions", () => {
    expect(heuristicComplexityAnalysis("x = 1\n").functionMetrics).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// radon
// ---------------------------------------------------------------------------

const RADON_OUTPUT = JSON.stringify({
  "/tmp/pyrefine-abc/source.py": [
    {
      type: "function",
      name: "f",
      complexity: 3,
      lineno: 1,
      col_offset: 0,
      endline: 6,
      closures: [{ type: "function", name: "g", complexity: 2, lineno: 2, col_offset: 4, endline: 4, closures: [] }],
    },
    {
      type: "class",
      name: "C",
      complexity: 2,
      lineno: 8,
      col_offset: 0,
      endline: 10,
      methods: [{ type: "method", name: "m", complexity: 1, lineno: 9, classname: "C", closures: [] }],
    },
    { type: "method", name: "m", complexity: 1, lineno: 9, col_offset: 4, endline: 10, classname: "C", closures: [] },
  ],
});

describe("parseRadonOutput", () => {
  it("collects functions, closures and methods but not classes", () => {
    expect(parseRadonOutput(RADON_OUTPUT)).toEqual({
      functionMetrics: [
        { name: "f", cyclomaticComplexity: 3, lineNumber: 1 },
        { name: "g", cyclomaticComplexity: 2, lineNumber: 2 },
        { name: "m", cyclomaticComplexity: 1, lineNumber: 9 },
      ],
      averageComplexity: 2,
      source: "tool",
    });
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseRadonOutput("Traceback (most recent call last)")).toThrow(ToolInvocationError);
  });

  it("rejects radon's per-file error shape", () => {
    expect(() => parseRadonOutput(JSON.stringify({ "source.py": { error: "invalid syntax" } }))).toThrow(
      ToolInvocationError
    );
  });
});

describe("analyzeComplexity", () => {
  it("uses radon when it is available", () => {
    const runner = createFakeRunner({
      radon: (args) => {
        expect(args.slice(0, 2)).toEqual(["cc", "--json"]);
        return toolResult({ stdout: RADON_OUTPUT });
      },
    });
    const report = analyzeComplexity("def f():\n    pass\n", { kind: "tool", context: { runner, timeoutMs: 1000 } });
    expect(report.source).toBe("tool");
    expect(report.functionMetrics).toHaveLength(3);
  });

  it("falls back to the tree walk when radon output is unusable", () => {
    const runner = createFakeRunner({ radon: () => toolResult({ stdout: "{}garbage" }) });
    const report = analyzeComplexity("def f():\n    pass\n", { kind: "tool", context: { runner, timeoutMs: 1000 } });
    expect(report).toEqual({
      functionMetrics: [{ name: "f", cyclomaticComplexity: 1, lineNumber: 1 }],
      averageComplexity: 1,
      source: "heuristic",
    });
  });
});

describe("countViolations", () => {
  const metrics = [
    { name: "a", cyclomaticComplexity: 10, lineNumber: 1 },
    { name: "b", cyclomaticComplexity: 11, lineNumber: 5 },
  ];

  it("counts functions strictly above the threshold", () => {
    expect(countViolations(metrics, 10)).toBe(1);
    expect(countViolations(metrics, 9)).toBe(2);
    expect(countViolations(metrics, 11)).toBe(0);
  });

  it("rounds exact halves to the even neighbour", () => {
    const withTotal = (first: number) =>
      [first, 2, 2, 2, 2, 2, 2, 2].map((cc, i) => ({ name: `f${i}`, cyclomaticComplexity: cc, lineNumber: i + 1 }));
    // 17 / 8 = 2.125 and 19 / 8 = 2.375
    expect(averageOf(withTotal(3))).toBe(2.12);
    expect(averageOf(withTotal(5))).toBe(2.38);
  });

  it("averages an empty list to zero", () => {
    expect(averageOf([])).toBe(0);
  });
});
