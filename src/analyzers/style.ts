import { defaults, getStyleSeverity, getStyleSuggestion } from "../config";
import type { StyleIssue } from "./types";
import { invokeTool, ToolInvocationError, withSourceFile } from "./tools";
import type { ToolContext } from "./tools";

export type StyleStrategy =
  | { kind: "tool"; context: ToolContext }
  | { kind: "heuristic" };

export function analyzeStyle(
  content: string,
  strategy: StyleStrategy,
  onFallback?: (error: ToolInvocationError) => void
): StyleIssue[] {
  switch (strategy.kind) {
    case "tool":
      try {
        return runFlake8(content, strategy.context);
      } catch (error) {
        if (!(error instanceof ToolInvocationError)) { throw error; }
        onFallback?.(error);
        return heuristicStyleAnalysis(content);
      }
    case "heuristic":
      return heuristicStyleAnalysis(content);
  }
}

const FLAKE8_FORMAT = "%(row)d:%(col)d:%(code)s:%(text)s";
const FLAKE8_LINE = /^(\d+):(\d+):([A-Za-z]+\d+):(.*)$/;

export function runFlake8(content: string, context: ToolContext): StyleIssue[] {
  // flake8 exits 1 when it reports issues
  const result = withSourceFile(content, (filePath) =>
    invokeTool(context, "flake8", [`--format=${FLAKE8_FORMAT}`, filePath], [0, 1])
  );
  return parseFlake8Output(result.stdout);
}

export function parseFlake8Output(stdout: string): StyleIssue[] {
  const issues: StyleIssue[] = [];
  for (const rawLine of stdout.split("\n")) {
    const line = rawLine.trimEnd();
    if (!line) { continue; }
    const match = FLAKE8_LINE.exec(line);
    if (!match) {
      throw new ToolInvocationError("flake8", `unexpected output line: ${line}`);
    }
    const code = match[3] ?? "";
    issues.push({
      line: Number(match[1]),
      code,
      message: (match[4] ?? "").trim(),
      suggestion: getStyleSuggestion(code),
      severity: getStyleSeverity(code),
    });
  }
  return issues;
}

const MULTIPLE_SPACES_AFTER_COMMA = /,\s{2,}/;
const OPERATOR_WITHOUT_SPACES = /[\p{L}\p{N}_][=+\-*/][\p{L}\p{N}_]/u;

export function heuristicStyleAnalysis(content: string): StyleIssue[] {
  const issues: StyleIssue[] = [];
  const lines = content.split("\n");

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const length = [...line].length;

    if (length > defaults.maxLineLength) {
      issues.push(styleIssue(
        lineNumber,
        "E501",
        `line too long (${length} > ${defaults.maxLineLength} characters)`,
        "break line into multiple lines"
      ));
    }

    if (MULTIPLE_SPACES_AFTER_COMMA.test(line)) {
      issues.push(styleIssue(lineNumber, "E241", "multiple spaces after ','"));
    }

    // `def f(x=1)` is valid spacing for defaults
    if (OPERATOR_WITHOUT_SPACES.test(line) && !line.includes("def ")) {
      issues.push(styleIssue(lineNumber, "E225", "missing whitespace around operator"));
    }

    if (line.endsWith(" ") || line.endsWith("\t")) {
      issues.push(styleIssue(lineNumber, "W291", "trailing whitespace"));
    }
  });

  return issues;
}

export function styleIssue(line: number, code: string, message: string, suggestion?: string): StyleIssue {
  return {
    line,
    code,
    message,
    suggestion: suggestion ?? getStyleSuggestion(code),
    severity: getStyleSeverity(code),
  };
}
