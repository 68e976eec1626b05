import { defaults, SUPPORTED_LANGUAGE } from "./config";
import type {
  AnalysisExports,
  AnalysisOptions,
  AnalysisResult,
  BugReport,
  ExportFormat,
  FileAnalysis,
  OverallMetrics,
  SourceUnit,
} from "./analyzers/types";
import { analyzeStyle } from "./analyzers/style";
import type { StyleStrategy } from "./analyzers/style";
import { analyzeFormatting } from "./analyzers/formatting";
import type { FormattingStrategy } from "./analyzers/formatting";
import { analyzeComplexity, countViolations } from "./analyzers/complexity";
import type { ComplexityStrategy } from "./analyzers/complexity";
import { detectBugs } from "./analyzers/bugs";
import { calculateMaintainabilityIndex, getCodeMetrics, suggestRefactorings } from "./analyzers/fileMetrics";
import { extractSnippet, generatePatch } from "./analyzers/snippets";
import { describeToolStatus, detectTools, spawnToolRunner, ToolInvocationError } from "./analyzers/tools";
import type { ToolAvailability, ToolContext, ToolRunner } from "./analyzers/tools";
import { renderMarkdownReport } from "./reporter/markdown";
import { serializeResult } from "./reporter/json";

export type AnalyzerSettings = {
  runner?: ToolRunner;
  toolTimeoutMs?: number;
  log?: (message: string) => void;
};

export type Analyzer = {
  readonly toolAvailability: Readonly<ToolAvailability>;
  readonly toolStatus: string;
  analyzeFiles(files: SourceUnit[], options?: AnalysisOptions): AnalysisResult;
  analyzeFile(file: SourceUnit, applyFormatting?: boolean): FileAnalysis;
};

type Strategies = {
  style: StyleStrategy;
  formatting: FormattingStrategy;
  complexity: ComplexityStrategy;
};

/**
 * Checks for the external tools once and returns an analyzer bound to the
 * result. Each missing tool only moves its own axis to the heuristic checks.
 */
export function createAnalyzer(settings: AnalyzerSettings = {}): Analyzer {
  const context: ToolContext = {
    runner: settings.runner ?? spawnToolRunner,
    timeoutMs: settings.toolTimeoutMs ?? defaults.toolTimeoutMs,
  };
  const log = settings.log ?? (() => undefined);

  const toolAvailability = detectTools(context.runner, context.timeoutMs);
  const toolStatus = describeToolStatus(toolAvailability);

  const strategies: Strategies = {
    style: toolAvailability.flake8 ? { kind: "tool", context } : { kind: "heuristic" },
    formatting: toolAvailability.black ? { kind: "tool", context } : { kind: "heuristic" },
    complexity: toolAvailability.radon ? { kind: "tool", context } : { kind: "heuristic" },
  };

  const analyzeFile = (file: SourceUnit, applyFormatting: boolean = defaults.applyFormatting): FileAnalysis => {
    const onFallback = (error: ToolInvocationError) => {
      log(`${file.path}: ${error.message} - falling back to heuristic analysis`);
    };
    return analyzeSingleFile(file, strategies, applyFormatting, onFallback);
  };

  const analyzeFiles = (files: SourceUnit[], options: AnalysisOptions = {}): AnalysisResult => {
    const threshold = options.complexityThreshold ?? defaults.complexityThreshold;
    const applyFormatting = options.applyFormatting ?? defaults.applyFormatting;

    const analyzed: FileAnalysis[] = [];
    for (const file of files) {
      if (file.language !== SUPPORTED_LANGUAGE) { continue; }
      log(`Analyzing ${file.path}`);
      try {
        analyzed.push(analyzeFile(file, applyFormatting));
      } catch (error) {
        const message = error instanceof Error ? error.message : "unknown error";
        log(`${file.path}: analysis failed: ${message}`);
        analyzed.push(failedAnalysis(file, message));
      }
    }

    const overallMetrics = aggregateMetrics(analyzed, threshold);
    const result: AnalysisResult = {
      summary: generateSummary(overallMetrics),
      files: analyzed,
      overallMetrics,
      toolStatus,
      exports: {},
    };
    result.exports = generateExports(result, options.exportFormats ?? []);
    return result;
  };

  return { toolAvailability, toolStatus, analyzeFiles, analyzeFile };
}

function analyzeSingleFile(
  file: SourceUnit,
  strategies: Strategies,
  applyFormatting: boolean,
  onFallback: (error: ToolInvocationError) => void
): FileAnalysis {
  const { path, content } = file;

  const styleIssues = analyzeStyle(content, strategies.style, onFallback);
  const formatting = analyzeFormatting(content, strategies.formatting, applyFormatting, onFallback);
  const complexity = analyzeComplexity(content, strategies.complexity, onFallback);
  const bugs = detectBugs(content);

  const beforeSnippet = extractSnippet(content);
  const rewritten = formatting.content !== content;

  return {
    path,
    language: file.language,
    styleIssues: [...styleIssues, ...formatting.issues],
    bugs,
    complexity,
    beforeSnippet,
    afterSnippet: rewritten ? extractSnippet(formatting.content) : beforeSnippet,
    patch: rewritten ? generatePatch(content, formatting.content, path) : undefined,
    codeMetrics: getCodeMetrics(content),
    maintainabilityIndex: calculateMaintainabilityIndex(content),
    refactorings: suggestRefactorings(content),
  };
}

function failedAnalysis(file: SourceUnit, message: string): FileAnalysis {
  const snippet = extractSnippet(file.content);
  const bug: BugReport = {
    line: 1,
    category: "internal",
    message: `Analysis failed: ${message}`,
    severity: "high",
  };
  return {
    path: file.path,
    language: file.language,
    styleIssues: [],
    bugs: [bug],
    complexity: { functionMetrics: [], averageComplexity: 0, source: "heuristic" },
    beforeSnippet: snippet,
    afterSnippet: snippet,
    codeMetrics: getCodeMetrics(file.content),
    maintainabilityIndex: 0,
    refactorings: [],
  };
}

export function aggregateMetrics(files: FileAnalysis[], threshold: number): OverallMetrics {
  return files.reduce<OverallMetrics>(
    (totals, file) => ({
      totalIssues: totals.totalIssues + file.styleIssues.length + file.bugs.length,
      highSeverity:
        totals.highSeverity +
        file.styleIssues.filter((issue) => issue.severity === "high").length +
        file.bugs.filter((bug) => bug.severity === "high").length,
      filesAnalyzed: totals.filesAnalyzed + 1,
      complexityViolations: totals.complexityViolations + countViolations(file.complexity.functionMetrics, threshold),
    }),
    { totalIssues: 0, highSeverity: 0, filesAnalyzed: 0, complexityViolations: 0 }
  );
}

export function generateSummary(metrics: OverallMetrics): string {
  const sentences = [
    `Analyzed ${metrics.filesAnalyzed} Python files.`,
    `Found ${metrics.totalIssues} total issues.`,
  ];

  if (metrics.highSeverity > 0) {
    sentences.push(`${metrics.highSeverity} high-severity issues require immediate attention.`);
  }
  if (metrics.complexityViolations > 0) {
    sentences.push(`${metrics.complexityViolations} functions exceed complexity threshold.`);
  }
  if (metrics.totalIssues === 0) {
    sentences.push("Code quality looks good!");
  }

  return sentences.join(" ");
}

function generateExports(result: AnalysisResult, formats: ExportFormat[]): AnalysisExports {
  const exports: AnalysisExports = {};
  if (formats.includes("markdown")) {
    exports.markdown = renderMarkdownReport(result);
  }
  if (formats.includes("json")) {
    exports.json = serializeResult(result);
  }
  return exports;
}
