import * as fs from "fs";
import * as path from "path";
import chalk from "chalk";
import { z } from "zod";

import { createAnalyzer } from "./analyzer";
import { defaults, SUPPORTED_LANGUAGE } from "./config";
import type { AnalysisOptions, AnalysisResult, SourceUnit } from "./analyzers/types";
import type { ToolRunner } from "./analyzers/tools";
import { renderTextReport } from "./reporter/text";
import { serializeResult, writeJsonReport } from "./reporter/json";
import { writeMarkdownReport } from "./reporter/markdown";

export type ScanOptions = {
  files: string[];
  input?: string;
  applyFormatting: boolean;
  complexityThreshold?: number;
  exportFormats?: string[];
  output?: string;
  outputDir: string;
  format: "human" | "json";
  toolTimeoutMs: number;
  runner?: ToolRunner;
};

const ExportFormatSchema = z.enum(["markdown", "json"]);

export const InputDocumentSchema = z.object({
  files: z.array(z.object({
    path: z.string().min(1),
    language: z.string(),
    content: z.string(),
  })),
  options: z.object({
    complexityThreshold: z.number().int().positive().optional(),
    applyFormatting: z.boolean().optional(),
    exportFormats: z.array(ExportFormatSchema).optional(),
  }).default({}),
});

export type InputDocument = z.infer<typeof InputDocumentSchema>;

export function scan(options: ScanOptions): AnalysisResult {
  const startTime = Date.now();

  console.log(chalk.bold("\npyrefine - Python code review\n"));

  let files: SourceUnit[];
  let analysisOptions: AnalysisOptions;
  if (options.input) {
    console.log(chalk.gray(`Reading input document ${options.input}`));
    const document = loadInputDocument(options.input);
    files = document.files;
    analysisOptions = document.options;
  } else {
    if (options.files.length === 0) {
      throw new Error("No input files specified");
    }
    files = loadFilesFromPaths(options.files, (message) => console.warn(chalk.yellow(`Warning: ${message}`)));
    analysisOptions = {};
  }

  if (files.length === 0) {
    throw new Error("No valid Python files to analyze");
  }

  // Command line flags win over the input document
  if (options.applyFormatting) {
    analysisOptions.applyFormatting = true;
  }
  if (options.complexityThreshold !== undefined) {
    analysisOptions.complexityThreshold = options.complexityThreshold;
  }
  if (options.exportFormats && options.exportFormats.length > 0) {
    analysisOptions.exportFormats = parseExportFormats(options.exportFormats);
  }

  console.log(chalk.cyan("Probing external tools..."));
  const analyzer = createAnalyzer({
    runner: options.runner,
    toolTimeoutMs: options.toolTimeoutMs,
    log: (message) => console.log(chalk.gray(`  ${message}`)),
  });
  console.log(chalk.gray(`  ${analyzer.toolStatus}\n`));

  const result = analyzer.analyzeFiles(files, analysisOptions);
  const threshold = analysisOptions.complexityThreshold ?? defaults.complexityThreshold;

  const output = options.format === "json"
    ? JSON.stringify(serializeResult(result), null, 2)
    : renderTextReport(result, threshold);

  if (options.output) {
    fs.mkdirSync(path.dirname(path.resolve(options.output)), { recursive: true });
    fs.writeFileSync(options.output, output, "utf-8");
    console.log(chalk.green(`Results written to ${options.output}`));
  } else {
    console.log(output);
  }

  if (result.exports.markdown !== undefined) {
    console.log(chalk.gray(`  Markdown: ${writeMarkdownReport(result, options.outputDir)}`));
  }
  if (result.exports.json !== undefined) {
    console.log(chalk.gray(`  JSON:     ${writeJsonReport(result, options.outputDir)}`));
  }

  const summaryColor = result.overallMetrics.highSeverity > 0 ? chalk.red : chalk.green;
  console.log(summaryColor.bold(`\n${result.summary}`));
  console.log(chalk.gray(`Duration: ${((Date.now() - startTime) / 1000).toFixed(1)}s\n`));

  return result;
}

export function loadFilesFromPaths(filePaths: string[], warn: (message: string) => void): SourceUnit[] {
  const files: SourceUnit[] = [];

  for (const filePath of filePaths) {
    if (!fs.existsSync(filePath)) {
      warn(`File ${filePath} not found`);
      continue;
    }
    if (path.extname(filePath) !== ".py") {
      warn(`Skipping non-Python file ${filePath}`);
      continue;
    }

    try {
      files.push({ path: filePath, language: SUPPORTED_LANGUAGE, content: fs.readFileSync(filePath, "utf-8") });
    } catch (error) {
      warn(`Error reading ${filePath}: ${error instanceof Error ? error.message : "unknown error"}`);
    }
  }

  return files;
}

export function loadInputDocument(inputPath: string): InputDocument {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(inputPath, "utf-8"));
  } catch (error) {
    throw new Error(`Error reading JSON file ${inputPath}: ${error instanceof Error ? error.message : "unknown error"}`);
  }

  const parsed = InputDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid input document ${inputPath}: ${details}`);
  }
  return parsed.data;
}

export function parseExportFormats(formats: string[]): ("markdown" | "json")[] {
  return formats
    .flatMap((entry) => entry.split(","))
    .map((format) => format.trim())
    .filter((format) => format.length > 0)
    .map((format) => {
      const parsed = ExportFormatSchema.safeParse(format);
      if (!parsed.success) {
        throw new Error(`Invalid export format: "${format}". Must be "markdown" or "json".`);
      }
      return parsed.data;
    });
}
