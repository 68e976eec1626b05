import type { AnalysisResult, FileAnalysis } from "../analyzers/types";
import { getFixSuggestion } from "../analyzers/fileMetrics";
import * as fs from "fs";
import * as path from "path";

export function writeMarkdownReport(result: AnalysisResult, outputDir: string): string {
  const filePath = path.join(outputDir, "pyrefine-report.md");
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, renderMarkdownReport(result), "utf-8");
  return filePath;
}

export function renderMarkdownReport(result: AnalysisResult): string {
  const lines: string[] = [];
  const metrics = result.overallMetrics;

  lines.push("# pyrefine Analysis Report");
  lines.push("");
  lines.push("## Summary");
  lines.push("");
  lines.push(result.summary);
  lines.push("");
  lines.push("## Overall Metrics");
  lines.push("");
  lines.push(`- Files analyzed: ${metrics.filesAnalyzed}`);
  lines.push(`- Total issues: ${metrics.totalIssues}`);
  lines.push(`- High severity issues: ${metrics.highSeverity}`);
  lines.push(`- Complexity violations: ${metrics.complexityViolations}`);
  lines.push("");

  for (const file of result.files) {
    lines.push(...renderFileSection(file));
  }

  if (result.toolStatus !== "all tools available") {
    lines.push("---");
    lines.push("");
    lines.push(`*Note: ${result.toolStatus}*`);
    lines.push("");
  }

  return lines.join("\n");
}

function renderFileSection(file: FileAnalysis): string[] {
  const lines: string[] = [];

  lines.push(`## File: \`${file.path}\``);
  lines.push("");
  lines.push(`### Style Issues (${file.styleIssues.length})`);
  lines.push("");
  for (const issue of file.styleIssues) {
    lines.push(`- Line ${issue.line}: ${issue.message} (${issue.code})`);
  }
  if (file.styleIssues.length > 0) { lines.push(""); }

  if (file.bugs.length > 0) {
    lines.push(`### Potential Bugs (${file.bugs.length})`);
    lines.push("");
    for (const bug of file.bugs) {
      lines.push(`- Line ${bug.line}: ${bug.message} [${bug.severity}]`);
    }
    lines.push("");

    const categories = [...new Set(file.bugs.map((bug) => bug.category))]
      .filter((category) => category === "mutable_default" || category === "exception_handling");
    for (const category of categories) {
      lines.push("```python");
      lines.push(getFixSuggestion(category));
      lines.push("```");
      lines.push("");
    }
  }

  const functionMetrics = file.complexity.functionMetrics;
  if (functionMetrics.length > 0) {
    lines.push("### Complexity Metrics");
    lines.push("");
    for (const metric of functionMetrics) {
      lines.push(`- ${metric.name} (line ${metric.lineNumber}): CCN = ${metric.cyclomaticComplexity}`);
    }
    lines.push(`- Average CCN: ${file.complexity.averageComplexity}`);
    lines.push("");
  }

  if (file.refactorings.length > 0) {
    lines.push(`### Refactoring Suggestions (${file.refactorings.length})`);
    lines.push("");
    for (const suggestion of file.refactorings) {
      lines.push(`- Line ${suggestion.line}: ${suggestion.message}`);
    }
    lines.push("");
  }

  lines.push(`Maintainability index: ${file.maintainabilityIndex.toFixed(1)} / 100`);
  lines.push("");

  if (file.patch) {
    lines.push("### Formatting Patch");
    lines.push("");
    lines.push("```diff");
    lines.push(file.patch.trimEnd());
    lines.push("```");
    lines.push("");
  }

  return lines;
}
