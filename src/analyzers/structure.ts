import type { SyntaxNode } from "@lezer/common";

import { childrenOf, descendantsOf, isToken, lineOf, parse, textOf } from "./parser";
import type { SyntaxTree } from "./parser";
import { findFunctions, functionName } from "./complexity";

export type FunctionInfo = {
  name: string;
  line: number;
  args: string[];
  docstring: string | null;
  isAsync: boolean;
};

export type MethodInfo = {
  name: string;
  line: number;
  isAsync: boolean;
};

export type ClassInfo = {
  name: string;
  line: number;
  bases: string[];
  methods: MethodInfo[];
  docstring: string | null;
};

export type ImportInfo = {
  module: string;
  alias: string | null;
  line: number;
};

export type FromImportInfo = {
  module: string;
  name: string;
  alias: string | null;
  line: number;
  level: number;
};

export type ImportSummary = {
  imports: ImportInfo[];
  fromImports: FromImportInfo[];
};

export function extractFunctions(content: string): FunctionInfo[] {
  const result = parse(content);
  if (!result.ok) { return []; }
  const tree = result.tree;

  return findFunctions(tree.tree.topNode).map((fn) => ({
    name: functionName(tree, fn),
    line: lineOf(tree, fn),
    args: positionalParameters(tree, fn),
    docstring: docstringOf(tree, fn),
    isAsync: isAsyncFunction(tree, fn),
  }));
}

export function extractClasses(content: string): ClassInfo[] {
  const result = parse(content);
  if (!result.ok) { return []; }
  const tree = result.tree;

  return [...descendantsOf(tree.tree.topNode)]
    .filter((node) => node.name === "ClassDefinition")
    .map((cls) => {
      const name = cls.getChild("VariableName");
      const argList = cls.getChild("ArgList");
      return {
        name: name ? textOf(tree, name) : "<anonymous>",
        line: lineOf(tree, cls),
        bases: argList ? baseClasses(textOf(tree, argList)) : [],
        methods: methodsOf(tree, cls),
        docstring: docstringOf(tree, cls),
      };
    });
}

export function extractImports(content: string): ImportSummary {
  const summary: ImportSummary = { imports: [], fromImports: [] };
  const result = parse(content);
  if (!result.ok) { return summary; }
  const tree = result.tree;

  for (const node of descendantsOf(tree.tree.topNode)) {
    if (node.name !== "ImportStatement") { continue; }
    const line = lineOf(tree, node);
    const statement = normalizeImport(textOf(tree, node));

    const fromMatch = /^from\s+(\.*)\s*([\w.]*)\s+import\s+(.+)$/.exec(statement);
    if (fromMatch) {
      const dots = fromMatch[1] ?? "";
      const module = `${dots}${fromMatch[2] ?? ""}`;
      for (const entry of splitNames(fromMatch[3] ?? "")) {
        summary.fromImports.push({ module, name: entry.name, alias: entry.alias, line, level: dots.length });
      }
      continue;
    }

    const importMatch = /^import\s+(.+)$/.exec(statement);
    if (importMatch) {
      for (const entry of splitNames(importMatch[1] ?? "")) {
        summary.imports.push({ module: entry.name, alias: entry.alias, line });
      }
    }
  }

  return summary;
}

function normalizeImport(text: string): string {
  return text
    .replace(/#.*$/gm, "")
    .replace(/\\\n/g, " ")
    .replace(/[()]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function splitNames(list: string): { name: string; alias: string | null }[] {
  return list
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const [name, alias] = part.split(/\s+as\s+/);
      return { name: (name ?? part).trim(), alias: alias?.trim() ?? null };
    });
}

/** Plain positional parameters, stopping at `*`/`**` and skipping default values. */
function positionalParameters(tree: SyntaxTree, fn: SyntaxNode): string[] {
  const params = fn.getChild("ParamList");
  if (!params) { return []; }

  const names: string[] = [];
  let skipNext = false;
  for (const child of childrenOf(params)) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (isToken(tree, child, "*") || isToken(tree, child, "**")) { break; }
    if (isToken(tree, child, "=")) {
      skipNext = true;
    } else if (child.name === "VariableName") {
      names.push(textOf(tree, child));
    }
  }
  return names;
}

function isAsyncFunction(tree: SyntaxTree, fn: SyntaxNode): boolean {
  const first = fn.firstChild;
  return first !== null && isToken(tree, first, "async");
}

function methodsOf(tree: SyntaxTree, cls: SyntaxNode): MethodInfo[] {
  const body = cls.getChild("Body");
  if (!body) { return []; }

  const methods: MethodInfo[] = [];
  for (const statement of childrenOf(body)) {
    const fn = statement.name === "DecoratedStatement" ? statement.getChild("FunctionDefinition") : statement;
    if (fn?.name === "FunctionDefinition") {
      methods.push({ name: functionName(tree, fn), line: lineOf(tree, fn), isAsync: isAsyncFunction(tree, fn) });
    }
  }
  return methods;
}

function baseClasses(argListText: string): string[] {
  const inner = argListText.replace(/^\(/, "").replace(/\)$/, "");
  const bases: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of inner) {
    if (char === "(" || char === "[" || char === "{") { depth++; }
    if (char === ")" || char === "]" || char === "}") { depth--; }
    if (char === "," && depth === 0) {
      bases.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  bases.push(current);

  // keyword arguments such as metaclass=... and unpacking are not bases
  return bases
    .map((base) => base.trim().replace(/\s+/g, " "))
    .filter((base) => base.length > 0 && !/^\w+\s*=[^=]/.test(base) && !base.startsWith("*"));
}

/** The leading string literal of a function or class body, with indentation cleaned. */
export function docstringOf(tree: SyntaxTree, definition: SyntaxNode): string | null {
  const body = definition.getChild("Body");
  if (!body) { return null; }

  const first = childrenOf(body).find((child) => !isToken(tree, child, ":") && child.name !== "Comment");
  if (!first || first.name !== "ExpressionStatement") { return null; }

  const literal = first.firstChild;
  if (!literal || literal.name !== "String" || literal.nextSibling) { return null; }
  return stringValue(textOf(tree, literal));
}

function stringValue(literal: string): string | null {
  const match = /^[rRuU]?("""|'''|"|')([\s\S]*)\1$/.exec(literal);
  if (!match) { return null; }
  return cleanDocstring(match[2] ?? "");
}

function cleanDocstring(text: string): string {
  const lines = text.replace(/\t/g, "        ").split("\n");
  const rest = lines.slice(1).filter((line) => line.trim().length > 0);
  const margin = rest.length > 0
    ? Math.min(...rest.map((line) => line.length - line.trimStart().length))
    : 0;
  const cleaned = [(lines[0] ?? "").trim(), ...lines.slice(1).map((line) => line.slice(margin).trimEnd())];
  return cleaned.join("\n").trim();
}
