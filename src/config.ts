import type { Severity } from "./analyzers/types";

export const VERSION = "1.0.0";

export const SUPPORTED_LANGUAGE = "python";

export const defaults = {
  complexityThreshold: 10,
  applyFormatting: false,
  maxLineLength: 79,
  snippetMaxLines: 20,
  toolTimeoutMs: 30_000,
};

export type ExternalTool = "flake8" | "black" | "radon";

// Detection order is also the order missing tools are listed in the status line
export const externalTools: ExternalTool[] = ["flake8", "black", "radon"];

export const styleSuggestions: Record<string, string> = {
  E501: "break line into multiple lines or increase line length limit",
  E225: "add spaces around operators",
  E231: "add space after comma",
  E241: "use single space after comma",
  W291: "remove trailing whitespace",
  E111: "use 4-space indentation",
  E301: "add blank line before function/class definition",
  BLACK: "run black formatter",
};

export const defaultStyleSuggestion = "refer to PEP8 style guide";

// Syntax-level failures reported by the linter
const highSeverityCodes = new Set(["E901", "E999"]);
// Pure whitespace codes
const lowSeverityCodes = new Set(["W291", "W292", "W293", "BLACK"]);

export function getStyleSuggestion(code: string): string {
  return styleSuggestions[code] ?? defaultStyleSuggestion;
}

export function getStyleSeverity(code: string): Severity {
  if (highSeverityCodes.has(code)) { return "high"; }
  if (lowSeverityCodes.has(code)) { return "low"; }
  return "medium";
}

// Thresholds for the refactoring suggestions and maintainability index
export const thresholds = {
  maxParameters: 5,
  maxClassMethods: 20,
  maxFileLines: 500,
  functionScoreCap: 20,
  classScoreCap: 25,
  commentRatioBonus: 0.1,
};

export const dangerousCalls = ["eval", "exec"];

export const throwawayNames = new Set(["_", "__"]);
