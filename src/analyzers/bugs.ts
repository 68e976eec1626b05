import type { SyntaxNode } from "@lezer/common";

import { dangerousCalls, throwawayNames } from "../config";
import type { BugReport } from "./types";
import { childrenOf, descendantsOf, isToken, lineOf, parse } from "./parser";
import type { SyntaxTree } from "./parser";
import { findFunctions } from "./complexity";

export type BugCheck = (tree: SyntaxTree, content: string) => BugReport[];

// --- mutable defaults ---

const MUTABLE_LITERALS: Record<string, string> = {
  ArrayExpression: "[]",
  DictionaryExpression: "{}",
  SetExpression: "set()",
};

export const checkMutableDefaults: BugCheck = (tree) => {
  const bugs: BugReport[] = [];

  for (const fn of findFunctions(tree.tree.topNode)) {
    const params = fn.getChild("ParamList");
    if (!params) { continue; }

    for (const defaultValue of parameterDefaults(tree, params)) {
      const literal = MUTABLE_LITERALS[defaultValue.name];
      if (literal) {
        bugs.push({
          line: lineOf(tree, fn),
          category: "mutable_default",
          message: `Dangerous default value ${literal} (mutable default argument)`,
          severity: "high",
          suggestion: "use None as the default and create the value inside the function",
        });
      }
    }
  }

  return bugs;
};

/** Default value expressions of a parameter list, positional and keyword-only. */
function parameterDefaults(tree: SyntaxTree, params: SyntaxNode): SyntaxNode[] {
  const defaults: SyntaxNode[] = [];
  const children = childrenOf(params);
  children.forEach((child, index) => {
    const next = children[index + 1];
    if (next && isToken(tree, child, "=")) {
      defaults.push(next);
    }
  });
  return defaults;
}

// --- bare except ---

export const checkBareExcept: BugCheck = (tree) => {
  const bugs: BugReport[] = [];

  for (const node of descendantsOf(tree.tree.topNode)) {
    // `except:` puts the handler body right after the keyword
    if (isToken(tree, node, "except") && node.nextSibling?.name === "Body") {
      bugs.push({
        line: lineOf(tree, node),
        category: "exception_handling",
        message: "Bare except clause - catches all exceptions including KeyboardInterrupt",
        severity: "medium",
        suggestion: "catch a specific exception type, or `except Exception` at the widest",
      });
    }
  }

  return bugs;
};

// --- unused variables ---

const SIMPLE_ASSIGNMENT = /^\s*(\w+)\s*=/;

/**
 * Textual approximation: an assigned name counts as used when its text shows
 * up anywhere after the assignment line. There is no scope awareness, so
 * shadowing and substrings of longer names hide real misses.
 */
export const checkUnusedVariables: BugCheck = (_tree, content) => {
  const bugs: BugReport[] = [];
  const lines = content.split("\n");

  lines.forEach((line, index) => {
    if (!line.includes("=") || line.trim().startsWith("#")) { return; }

    const match = SIMPLE_ASSIGNMENT.exec(line);
    const name = match?.[1];
    if (!name || throwawayNames.has(name) || !isLowerCase(name)) { return; }

    const remaining = lines.slice(index + 1).join("\n");
    if (!remaining.includes(name)) {
      bugs.push({
        line: index + 1,
        category: "unused_variable",
        message: `Variable '${name}' assigned but never used`,
        severity: "low",
      });
    }
  });

  return bugs;
};

/** At least one cased letter and no uppercase ones. */
function isLowerCase(name: string): boolean {
  return name !== name.toUpperCase() && name === name.toLowerCase();
}

// --- dangerous calls ---

export const checkSecurityIssues: BugCheck = (_tree, content) => {
  const bugs: BugReport[] = [];
  const lines = content.split("\n");

  for (const call of dangerousCalls) {
    const needle = `${call}(`;
    if (!content.includes(needle)) { continue; }

    const index = lines.findIndex((line) => line.includes(needle));
    bugs.push({
      line: index >= 0 ? index + 1 : 1,
      category: "security",
      message: `Use of ${call}() is dangerous and should be avoided`,
      severity: "high",
      suggestion: call === "eval" ? "parse literals with ast.literal_eval" : "avoid executing dynamically built code",
    });
  }

  return bugs;
};

export const defaultBugChecks: BugCheck[] = [
  checkMutableDefaults,
  checkBareExcept,
  checkUnusedVariables,
  checkSecurityIssues,
];

export function detectBugs(content: string, checks: BugCheck[] = defaultBugChecks): BugReport[] {
  const result = parse(content);
  if (!result.ok) {
    return [{
      line: result.failure.line,
      category: "syntax",
      message: `Syntax error: ${result.failure.message}`,
      severity: "high",
    }];
  }

  return checks.flatMap((check) => check(result.tree, content));
}
