import type { AnalysisResult, FileAnalysis } from "../analyzers/types";

const PREVIEW_LINES = 10;

export function renderTextReport(result: AnalysisResult, complexityThreshold: number): string {
  const lines: string[] = [];
  const metrics = result.overallMetrics;

  lines.push("=".repeat(60));
  lines.push("pyrefine Analysis Report");
  lines.push("=".repeat(60));
  lines.push("");

  lines.push("SUMMARY");
  lines.push("-".repeat(20));
  lines.push(result.summary);
  lines.push("");

  lines.push("METRICS");
  lines.push("-".repeat(20));
  lines.push(`Files analyzed: ${metrics.filesAnalyzed}`);
  lines.push(`Total issues: ${metrics.totalIssues}`);
  lines.push(`High severity: ${metrics.highSeverity}`);
  lines.push(`Complexity violations: ${metrics.complexityViolations}`);
  lines.push("");

  result.files.forEach((file, index) => {
    lines.push(...renderFile(file, index + 1, complexityThreshold));
    lines.push("");
  });

  if (result.toolStatus !== "all tools available") {
    lines.push("TOOL STATUS");
    lines.push("-".repeat(20));
    lines.push(result.toolStatus);
    lines.push("");
  }

  const exported = Object.keys(result.exports);
  if (exported.length > 0) {
    lines.push("EXPORTS");
    lines.push("-".repeat(20));
    for (const format of exported) {
      lines.push(`- ${format.toUpperCase()} report generated`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

function renderFile(file: FileAnalysis, position: number, complexityThreshold: number): string[] {
  const lines: string[] = [];

  lines.push(`FILE ${position}: ${file.path}`);
  lines.push("-".repeat(file.path.length + 10));

  if (file.styleIssues.length > 0) {
    lines.push("Style Issues:");
    for (const issue of file.styleIssues) {
      lines.push(`  Line ${String(issue.line).padStart(3)}: [${issue.code}] ${issue.message}`);
      lines.push(`           Suggestion: ${issue.suggestion}`);
    }
  }

  if (file.bugs.length > 0) {
    lines.push("Potential Bugs:");
    for (const bug of file.bugs) {
      lines.push(`  Line ${String(bug.line).padStart(3)}: [${bug.severity.toUpperCase()}] ${bug.message}`);
    }
  }

  const functionMetrics = file.complexity.functionMetrics;
  if (functionMetrics.length > 0) {
    lines.push("Complexity Metrics:");
    for (const metric of functionMetrics) {
      const marker = metric.cyclomaticComplexity > complexityThreshold ? " (!)" : "";
      lines.push(`  ${metric.name.padEnd(20)} (line ${String(metric.lineNumber).padStart(3)}): CCN = ${metric.cyclomaticComplexity}${marker}`);
    }
    lines.push(`  Average CCN: ${file.complexity.averageComplexity.toFixed(1)}`);
  }

  if (file.afterSnippet !== file.beforeSnippet) {
    lines.push("");
    lines.push("Suggested Changes:");
    lines.push("  Before:");
    lines.push(...preview(file.beforeSnippet));
    lines.push("  After:");
    lines.push(...preview(file.afterSnippet));
  }

  return lines;
}

function preview(snippet: string): string[] {
  const snippetLines = snippet.split("\n");
  const shown = snippetLines.slice(0, PREVIEW_LINES).map((line) => `    ${line}`);
  if (snippetLines.length > PREVIEW_LINES) {
    shown.push("    ...");
  }
  return shown;
}
