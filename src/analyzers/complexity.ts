import type { SyntaxNode } from "@lezer/common";
import { z } from "zod";

import type { ComplexityReport, FunctionComplexityMetric } from "./types";
import { descendantsOf, isLeaf, lineOf, parse, textOf } from "./parser";
import type { SyntaxTree } from "./parser";
import { roundHalfEven } from "./rounding";
import { invokeTool, ToolInvocationError, withSourceFile } from "./tools";
import type { ToolContext } from "./tools";

export type ComplexityStrategy =
  | { kind: "tool"; context: ToolContext }
  | { kind: "heuristic" };

export function analyzeComplexity(
  content: string,
  strategy: ComplexityStrategy,
  onFallback?: (error: ToolInvocationError) => void
): ComplexityReport {
  switch (strategy.kind) {
    case "tool":
      try {
        return runRadon(content, strategy.context);
      } catch (error) {
        if (!(error instanceof ToolInvocationError)) { throw error; }
        onFallback?.(error);
        return heuristicComplexityAnalysis(content);
      }
    case "heuristic":
      return heuristicComplexityAnalysis(content);
  }
}

// --- radon ---

type RadonBlock = {
  type: string;
  name: string;
  complexity: number;
  lineno: number;
  closures?: RadonBlock[];
};

const RadonBlockSchema: z.ZodType<RadonBlock> = z.lazy(() =>
  z.object({
    type: z.string(),
    name: z.string(),
    complexity: z.number().int().min(1),
    lineno: z.number().int().min(1),
    closures: z.array(RadonBlockSchema).optional(),
  })
);

// radon reports `{ "<file>": { "error": "..." } }` for files it cannot parse,
// which fails this schema and is treated like any other malformed output
const RadonOutputSchema = z.record(z.array(RadonBlockSchema));

export function runRadon(content: string, context: ToolContext): ComplexityReport {
  const result = withSourceFile(content, (filePath) =>
    invokeTool(context, "radon", ["cc", "--json", filePath])
  );
  return parseRadonOutput(result.stdout);
}

export function parseRadonOutput(stdout: string): ComplexityReport {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ToolInvocationError("radon", "output is not valid JSON");
  }

  const parsed = RadonOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ToolInvocationError("radon", `unexpected output: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
  }

  const metrics: FunctionComplexityMetric[] = [];
  for (const blocks of Object.values(parsed.data)) {
    for (const block of blocks) {
      // Methods are listed at the top level as well as under their class
      if (block.type === "function" || block.type === "method") {
        collectRadonBlock(block, metrics);
      }
    }
  }

  return { functionMetrics: metrics, averageComplexity: averageOf(metrics), source: "tool" };
}

function collectRadonBlock(block: RadonBlock, metrics: FunctionComplexityMetric[]): void {
  metrics.push({ name: block.name, cyclomaticComplexity: block.complexity, lineNumber: block.lineno });
  for (const closure of block.closures ?? []) {
    collectRadonBlock(closure, metrics);
  }
}

// --- tree walk ---

const BRANCH_NODES = new Set(["IfStatement", "WhileStatement", "ForStatement"]);
const COMPREHENSION_NODES = new Set([
  "ArrayComprehensionExpression",
  "DictionaryComprehensionExpression",
  "SetComprehensionExpression",
  "ComprehensionExpression",
  // a lone generator argument, as in sum(x for x in xs)
  "ArgList",
]);

export function heuristicComplexityAnalysis(content: string): ComplexityReport {
  const result = parse(content);
  if (!result.ok) {
    return { functionMetrics: [], averageComplexity: 0, source: "heuristic" };
  }

  const metrics = findFunctions(result.tree.tree.topNode).map((fn) => ({
    name: functionName(result.tree, fn),
    cyclomaticComplexity: calculateComplexity(result.tree, fn),
    lineNumber: lineOf(result.tree, fn),
  }));

  return { functionMetrics: metrics, averageComplexity: averageOf(metrics), source: "heuristic" };
}

/** All function definitions below `node`, nested ones included, in document order. */
export function findFunctions(node: SyntaxNode): SyntaxNode[] {
  return [...descendantsOf(node)].filter((n) => n.name === "FunctionDefinition");
}

export function functionName(tree: SyntaxTree, fn: SyntaxNode): string {
  const name = fn.getChild("VariableName");
  return name ? textOf(tree, name) : "<anonymous>";
}

export function calculateComplexity(tree: SyntaxTree, fn: SyntaxNode): number {
  let complexity = 1;

  for (const node of descendantsOf(fn)) {
    if (BRANCH_NODES.has(node.name)) {
      complexity += 1;
    } else if (isLeaf(node)) {
      complexity += leafWeight(tree, node);
    }
  }

  return complexity;
}

function leafWeight(tree: SyntaxTree, leaf: SyntaxNode): number {
  const parentName = leaf.parent?.name ?? "";
  switch (textOf(tree, leaf)) {
    case "elif":
    case "except":
      return 1;
    case "and":
    case "or":
      return parentName === "BinaryExpression" ? 1 : 0;
    case "for":
    case "if":
      // generator clauses and their filters
      return COMPREHENSION_NODES.has(parentName) ? 1 : 0;
    default:
      return 0;
  }
}

export function averageOf(metrics: FunctionComplexityMetric[]): number {
  if (metrics.length === 0) { return 0; }
  const total = metrics.reduce((sum, m) => sum + m.cyclomaticComplexity, 0);
  return roundHalfEven(total / metrics.length, 2);
}

export function countViolations(metrics: FunctionComplexityMetric[], threshold: number): number {
  return metrics.filter((m) => m.cyclomaticComplexity > threshold).length;
}
