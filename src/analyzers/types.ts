export type Severity = "low" | "medium" | "high";

export type SourceUnit = {
  path: string;
  language: string;
  content: string;
};

export type StyleIssue = {
  line: number;
  code: string;
  message: string;
  suggestion: string;
  severity: Severity;
};

export type BugCategory =
  | "syntax"
  | "mutable_default"
  | "exception_handling"
  | "unused_variable"
  | "security"
  | "internal";

export type BugReport = {
  line: number;
  category: BugCategory;
  message: string;
  severity: Severity;
  suggestion?: string;
};

export type FunctionComplexityMetric = {
  name: string;
  cyclomaticComplexity: number; // >= 1
  lineNumber: number;
};

export type ComplexityReport = {
  functionMetrics: FunctionComplexityMetric[];
  averageComplexity: number; // rounded to 2 decimals, 0 when there are no functions
  source: "tool" | "heuristic";
};

export type CodeMetrics = {
  totalLines: number;
  codeLines: number;
  commentLines: number;
  blankLines: number;
  stringLiteralLines: number;
  codePercentage: number;
  commentPercentage: number;
};

export type RefactoringType = "parameter_list" | "documentation" | "class_size" | "file_size";

export type RefactoringSuggestion = {
  type: RefactoringType;
  line: number;
  message: string;
  severity: Severity;
  target?: string; // function or class name
};

export type FileAnalysis = {
  path: string;
  language: string;
  styleIssues: StyleIssue[];
  bugs: BugReport[];
  complexity: ComplexityReport;
  beforeSnippet: string;
  afterSnippet: string;
  patch?: string;
  codeMetrics: CodeMetrics;
  maintainabilityIndex: number; // 0-100
  refactorings: RefactoringSuggestion[];
};

export type OverallMetrics = {
  totalIssues: number;
  highSeverity: number;
  filesAnalyzed: number;
  complexityViolations: number;
};

export type ExportFormat = "markdown" | "json";

export type AnalysisOptions = {
  complexityThreshold?: number;
  applyFormatting?: boolean;
  exportFormats?: ExportFormat[];
};

export type SerializedResult = {
  summary: string;
  files: SerializedFile[];
  overallMetrics: OverallMetrics;
  toolStatus: string;
};

export type SerializedFile = {
  path: string;
  language: string;
  styleIssues: StyleIssue[];
  bugs: BugReport[];
  complexity: ComplexityReport;
  codeMetrics: CodeMetrics;
  maintainabilityIndex: number;
  refactorings: RefactoringSuggestion[];
  beforeSnippet: string;
  afterSnippet: string;
  patch: string | null;
};

export type AnalysisExports = {
  markdown?: string;
  json?: SerializedResult;
};

export type AnalysisResult = {
  summary: string;
  files: FileAnalysis[];
  overallMetrics: OverallMetrics;
  toolStatus: string;
  exports: AnalysisExports;
};
