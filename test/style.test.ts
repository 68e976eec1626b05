import { describe, it, expect, vi } from "vitest";

import { analyzeStyle, heuristicStyleAnalysis, parseFlake8Output } from "../src/analyzers/style";
import { ToolInvocationError } from "../src/analyzers/tools";
import type { ToolContext } from "../src/analyzers/tools";
import { createFakeRunner, toolResult } from "./helpers/fakeRunner";

describe("heuristicStyleAnalysis", () => {
  it("flags operators without surrounding spaces", () => {
    expect(heuristicStyleAnalysis("x=1")).toEqual([
      {
        line: 1,
        code: "E225",
        message: "missing whitespace around operator",
        suggestion: "add spaces around operators",
        severity: "medium",
      },
    ]);
  });

  it("does not flag default values in a def line", () => {
    expect(heuristicStyleAnalysis("def f(x=1):\n    return x\n")).toEqual([]);
  });

  it("flags lines longer than 79 characters", () => {
    const issues = heuristicStyleAnalysis("a".repeat(80));
    expect(issues).toHaveLength(1);
    expect(issues[0]?.code).toBe("E501");
    expect(issues[0]?.message).toBe("line too long (80 > 79 characters)");
    expect(issues[0]?.suggestion).toBe("break line into multiple lines");
  });

  it("accepts a line of exactly 79 characters", () => {
    expect(heuristicStyleAnalysis("a".repeat(79))).toEqual([]);
  });

  it("flags multiple spaces after a comma", () => {
    const issues = heuristicStyleAnalysis("foo(a,  b)");
    expect(issues.map((issue) => [issue.code, issue.message])).toEqual([["E241", "multiple spaces after ','"]]);
  });

  it("flags trailing whitespace as low severity", () => {
    const issues = heuristicStyleAnalysis("x = 1 ");
    expect(issues).toEqual([
      { line: 1, code: "W291", message: "trailing whitespace", suggestion: "remove trailing whitespace", severity: "low" },
    ]);
  });

  it("reports several findings on one line in rule order", () => {
    const issues = heuristicStyleAnalysis("ok = 1\ny=foo(a,  b) ");
    expect(issues.map((issue) => [issue.line, issue.code])).toEqual([
      [2, "E241"],
      [2, "E225"],
      [2, "W291"],
    ]);
  });

  it("is deterministic", () => {
    const source = "x=1\ny = 2 \n";
    expect(heuristicStyleAnalysis(source)).toEqual(heuristicStyleAnalysis(source));
  });
});

// ---------------------------------------------------------------------------
// flake8
// ---------------------------------------------------------------------------

describe("parseFlake8Output", () => {
  it("parses row, code and message", () => {
    const issues = parseFlake8Output("3:80:E501:line too long (88 > 79 characters)\n5:1:W291:trailing whitespace\n");
    expect(issues).toEqual([
      {
        line: 3,
        code: "E501",
        message: "line too long (88 > 79 characters)",
        suggestion: "break line into multiple lines or increase line length limit",
        severity: "medium",
      },
      {
        line: 5,
        code: "W291",
        message: "trailing whitespace",
        suggestion: "remove trailing whitespace",
        severity: "low",
      },
    ]);
  });

  it("keeps colons inside the message", () => {
    const [issue] = parseFlake8Output("1:1:E999:SyntaxError: invalid syntax\n");
    expect(issue?.message).toBe("SyntaxError: invalid syntax");
    expect(issue?.severity).toBe("high");
  });

  it("falls back to the generic suggestion for unknown codes", () => {
    const [issue] = parseFlake8Output("2:1:F401:'os' imported but unused");
    expect(issue?.suggestion).toBe("refer to PEP8 style guide");
    expect(issue?.severity).toBe("medium");
  });

  it("returns nothing for empty output", () => {
    expect(parseFlake8Output("")).toEqual([]);
  });

  it("rejects lines it cannot read", () => {
    expect(() => parseFlake8Output("not flake8 output")).toThrow(ToolInvocationError);
  });
});

describe("analyzeStyle", () => {
  const contextFor = (runner: ToolContext["runner"]): ToolContext => ({ runner, timeoutMs: 1000 });

  it("runs flake8 on a temporary copy of the file", () => {
    const runner = createFakeRunner({
      flake8: (args) => {
        expect(args[0]).toBe("--format=%(row)d:%(col)d:%(code)s:%(text)s");
        expect(args[1]).toMatch(/source\.py$/);
        return toolResult({ exitCode: 1, stdout: "1:2:E225:missing whitespace around operator\n" });
      },
    });

    const issues = analyzeStyle("x=1\n", { kind: "tool", context: contextFor(runner) });
    expect(issues.map((issue) => [issue.line, issue.code])).toEqual([[1, "E225"]]);
  });

  it("falls back to the heuristics when flake8 fails", () => {
    const runner = createFakeRunner({
      flake8: () => toolResult({ exitCode: 2, stderr: "" }),
    });
    const onFallback = vi.fn();

    const issues = analyzeStyle("x = 1 \n", { kind: "tool", context: contextFor(runner) }, onFallback);

    expect(issues.map((issue) => issue.code)).toEqual(["W291"]);
    expect(onFallback).toHaveBeenCalledTimes(1);
    expect(onFallback.mock.calls[0]?.[0]).toBeInstanceOf(ToolInvocationError);
    expect(onFallback.mock.calls[0]?.[0].message).toBe("flake8: exited with code 2");
  });

  it("falls back when flake8 cannot be started", () => {
    const runner = createFakeRunner({
      flake8: () => toolResult({ exitCode: null, error: new Error("spawnSync flake8 ETIMEDOUT") }),
    });

    const issues = analyzeStyle("x=1", { kind: "tool", context: contextFor(runner) });
    expect(issues.map((issue) => issue.code)).toEqual(["E225"]);
  });
});
