import * as fs from "fs";

import type { StyleIssue } from "./types";
import { styleIssue } from "./style";
import { invokeTool, ToolInvocationError, withSourceFile } from "./tools";
import type { ToolContext } from "./tools";

export type FormattingStrategy =
  | { kind: "tool"; context: ToolContext }
  | { kind: "heuristic" };

export type FormattingResult = {
  content: string;
  issues: StyleIssue[];
};

export function analyzeFormatting(
  content: string,
  strategy: FormattingStrategy,
  applyFormatting: boolean,
  onFallback?: (error: ToolInvocationError) => void
): FormattingResult {
  switch (strategy.kind) {
    case "tool":
      try {
        return runBlack(content, strategy.context, applyFormatting);
      } catch (error) {
        if (!(error instanceof ToolInvocationError)) { throw error; }
        onFallback?.(error);
        return heuristicFormattingAnalysis(content);
      }
    case "heuristic":
      return heuristicFormattingAnalysis(content);
  }
}

export function runBlack(content: string, context: ToolContext, applyFormatting: boolean): FormattingResult {
  return withSourceFile(content, (filePath) => {
    const preview = invokeTool(context, "black", ["--diff", "-q", filePath]);
    if (!preview.stdout.trim()) {
      return { content, issues: [] };
    }

    const issues = [styleIssue(1, "BLACK", "code formatting can be improved")];
    if (!applyFormatting) {
      return { content, issues };
    }

    invokeTool(context, "black", ["-q", filePath]);
    return { content: fs.readFileSync(filePath, "utf-8"), issues };
  });
}

// Leading runs that are tolerated even though they are not four spaces
const toleratedIndents = [2, 6, 8].map((width) => " ".repeat(width));

export function heuristicFormattingAnalysis(content: string): FormattingResult {
  const issues: StyleIssue[] = [];

  content.split("\n").forEach((line, index) => {
    if (!line.trim() || !line.startsWith(" ") || line.startsWith("    ")) { return; }
    if (toleratedIndents.some((indent) => line.startsWith(indent))) { return; }
    issues.push(styleIssue(index + 1, "E111", "indentation is not a multiple of four"));
  });

  return { content, issues };
}
