#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";

import { scan } from "./scanner";
import { defaults, VERSION } from "./config";

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

const program = new Command();

program
  .name("pyrefine")
  .description("Python code reviewer: style, formatting, complexity and likely bugs")
  .version(VERSION);

program
  .command("analyze")
  .description("Analyze Python files")
  .argument("[files...]", "Python files to analyze")
  .option("-i, --input <json>", "JSON input document with files and options")
  .option("--apply-black", "Apply black formatting and report the patch", false)
  .option("--max-complexity <n>", "Maximum cyclomatic complexity threshold", parsePositiveInt)
  .option("--export <formats>", "Export formats (comma-separated): markdown,json")
  .option("-o, --output <file>", "Output file for results")
  .option("--output-dir <dir>", "Output directory for exported reports", ".")
  .option("--format <format>", "Output format: 'human' or 'json'", "human")
  .option("--tool-timeout <ms>", "Timeout for each external tool run", parsePositiveInt, defaults.toolTimeoutMs)
  .action((files: string[], options: {
    input?: string;
    applyBlack: boolean;
    maxComplexity?: number;
    export?: string;
    output?: string;
    outputDir: string;
    format: string;
    toolTimeout: number;
  }) => {
    try {
      if (options.format !== "human" && options.format !== "json") {
        throw new Error(`Invalid --format value: "${options.format}". Must be "human" or "json".`);
      }
      scan({
        files,
        input: options.input,
        applyFormatting: options.applyBlack,
        complexityThreshold: options.maxComplexity,
        exportFormats: options.export ? [options.export] : [],
        output: options.output,
        outputDir: options.outputDir,
        format: options.format,
        toolTimeoutMs: options.toolTimeout,
      });
    } catch (error) {
      console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command("version")
  .description("Show version")
  .action(() => {
    console.log(`pyrefine ${VERSION}`);
  });

program.parse();
