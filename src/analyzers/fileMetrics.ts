import { thresholds } from "../config";
import type { CodeMetrics, RefactoringSuggestion } from "./types";
import { parse } from "./parser";
import { roundHalfEven } from "./rounding";
import { extractClasses, extractFunctions } from "./structure";

export function getCodeMetrics(content: string): CodeMetrics {
  const lines = content.split("\n");
  const metrics: CodeMetrics = {
    totalLines: lines.length,
    codeLines: 0,
    commentLines: 0,
    blankLines: 0,
    stringLiteralLines: 0,
    codePercentage: 0,
    commentPercentage: 0,
  };

  let openDelimiter: string | null = null;

  for (const line of lines) {
    const stripped = line.trim();

    if (!stripped) {
      metrics.blankLines++;
    } else if (stripped.startsWith("#")) {
      metrics.commentLines++;
    } else if (openDelimiter === null) {
      const delimiter = ['"""', "'''"].find((d) => line.includes(d));
      if (delimiter) {
        // a line that opens and closes the string stays outside it
        openDelimiter = countOccurrences(line, delimiter) >= 2 ? null : delimiter;
      } else {
        metrics.codeLines++;
      }
    } else {
      if (line.includes(openDelimiter)) {
        openDelimiter = null;
      }
      metrics.stringLiteralLines++;
    }
  }

  if (metrics.totalLines > 0) {
    metrics.codePercentage = roundHalfEven(metrics.codeLines / metrics.totalLines * 100, 1);
    metrics.commentPercentage = roundHalfEven(metrics.commentLines / metrics.totalLines * 100, 1);
  }

  return metrics;
}

export type SyntaxValidation =
  | { valid: true }
  | { valid: false; error: string };

export function validateSyntax(content: string): SyntaxValidation {
  const result = parse(content);
  if (result.ok) {
    return { valid: true };
  }
  return { valid: false, error: `Line ${result.failure.line}: ${result.failure.message}` };
}

export function suggestRefactorings(content: string): RefactoringSuggestion[] {
  const suggestions: RefactoringSuggestion[] = [];

  for (const fn of extractFunctions(content)) {
    if (fn.args.length > thresholds.maxParameters) {
      suggestions.push({
        type: "parameter_list",
        target: fn.name,
        line: fn.line,
        message: `Function '${fn.name}' has ${fn.args.length} parameters. Consider using a configuration object or reducing parameters.`,
        severity: "medium",
      });
    }

    if (!fn.docstring) {
      suggestions.push({
        type: "documentation",
        target: fn.name,
        line: fn.line,
        message: `Function '${fn.name}' lacks a docstring. Consider adding documentation.`,
        severity: "low",
      });
    }
  }

  for (const cls of extractClasses(content)) {
    if (!cls.docstring) {
      suggestions.push({
        type: "documentation",
        target: cls.name,
        line: cls.line,
        message: `Class '${cls.name}' lacks a docstring. Consider adding documentation.`,
        severity: "low",
      });
    }

    if (cls.methods.length > thresholds.maxClassMethods) {
      suggestions.push({
        type: "class_size",
        target: cls.name,
        line: cls.line,
        message: `Class '${cls.name}' has ${cls.methods.length} methods. Consider splitting into smaller classes.`,
        severity: "medium",
      });
    }
  }

  const lineCount = content.split("\n").length;
  if (lineCount > thresholds.maxFileLines) {
    suggestions.push({
      type: "file_size",
      line: 1,
      message: `File has ${lineCount} lines. Consider splitting into multiple modules.`,
      severity: "medium",
    });
  }

  return suggestions;
}

/** 0-100, higher is better. */
export function calculateMaintainabilityIndex(content: string): number {
  if (!parse(content).ok) { return 0; }

  const lines = content.split("\n");
  const nonBlankLines = lines.filter((line) => line.trim().length > 0).length;
  if (nonBlankLines === 0) { return 100; }

  const functions = extractFunctions(content).length;
  const classes = extractClasses(content).length;

  let score = 100;
  if (nonBlankLines > thresholds.maxFileLines) {
    score -= (nonBlankLines - thresholds.maxFileLines) / 50;
  }
  if (functions > 0) {
    score += Math.min(functions * 2, thresholds.functionScoreCap);
  }
  if (classes > 0) {
    score += Math.min(classes * 5, thresholds.classScoreCap);
  }

  const commentLines = lines.filter((line) => line.trim().startsWith("#")).length;
  if (commentLines / nonBlankLines > thresholds.commentRatioBonus) {
    score += 10;
  }

  return Math.max(0, Math.min(100, score));
}

const fixSuggestions: Record<string, string> = {
  mutable_default: [
    "Replace the mutable default with None and create the value inside the function:",
    "",
    "def func(items=None):",
    "    if items is None:",
    "        items = []",
    "    items.append(1)",
    "    return items",
  ].join("\n"),
  exception_handling: [
    "Catch specific exception types instead of using a bare except:",
    "",
    "try:",
    "    risky_operation()",
    "except ValueError as e:",
    "    handle_error(e)",
  ].join("\n"),
  long_line: [
    "Break long lines inside parentheses:",
    "",
    "result = some_function(",
    "    arg1, arg2, arg3,",
    "    arg4, arg5, arg6",
    ")",
  ].join("\n"),
  missing_spaces: [
    "Add spaces around operators:",
    "",
    "x = y + z * 2",
  ].join("\n"),
};

export function getFixSuggestion(issueType: string): string {
  return fixSuggestions[issueType] ?? "Refer to PEP8 style guide for best practices.";
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}
