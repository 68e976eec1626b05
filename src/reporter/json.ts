import type { AnalysisResult, SerializedResult } from "../analyzers/types";
import * as fs from "fs";
import * as path from "path";

export function serializeResult(result: AnalysisResult): SerializedResult {
  return {
    summary: result.summary,
    files: result.files.map((file) => ({
      path: file.path,
      language: file.language,
      styleIssues: file.styleIssues,
      bugs: file.bugs,
      complexity: file.complexity,
      codeMetrics: file.codeMetrics,
      maintainabilityIndex: file.maintainabilityIndex,
      refactorings: file.refactorings,
      beforeSnippet: file.beforeSnippet,
      afterSnippet: file.afterSnippet,
      patch: file.patch ?? null,
    })),
    overallMetrics: result.overallMetrics,
    toolStatus: result.toolStatus,
  };
}

export function writeJsonReport(result: AnalysisResult, outputDir: string): string {
  const filePath = path.join(outputDir, "pyrefine-report.json");
  fs.mkdirSync(outputDir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(serializeResult(result), null, 2), "utf-8");
  return filePath;
}
