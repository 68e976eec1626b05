import { spawnSync } from "child_process";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { defaults, externalTools } from "../config";
import type { ExternalTool } from "../config";

export type ToolRunResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
};

/**
 * Runs one external program to completion. The analyzer only talks to the
 * outside world through this seam, so tests can swap in an in-process fake.
 */
export type ToolRunner = (command: string, args: string[], timeoutMs: number) => ToolRunResult;

export type ToolAvailability = Record<ExternalTool, boolean>;

export class ToolInvocationError extends Error {
  constructor(public readonly tool: ExternalTool, message: string) {
    super(`${tool}: ${message}`);
    this.name = "ToolInvocationError";
  }
}

export const spawnToolRunner: ToolRunner = (command, args, timeoutMs) => {
  const result = spawnSync(command, args, {
    encoding: "utf-8",
    timeout: timeoutMs,
    maxBuffer: 10 * 1024 * 1024, // 10MB
  });
  return {
    exitCode: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    error: result.error,
  };
};

export function detectTools(runner: ToolRunner, timeoutMs: number = defaults.toolTimeoutMs): ToolAvailability {
  const availability: ToolAvailability = { flake8: false, black: false, radon: false };
  for (const tool of externalTools) {
    const result = runner(tool, ["--version"], timeoutMs);
    availability[tool] = !result.error && result.exitCode === 0;
  }
  return availability;
}

export function describeToolStatus(availability: ToolAvailability): string {
  const missing = externalTools.filter((tool) => !availability[tool]);
  if (missing.length > 0) {
    return `Tools not available: ${missing.join(", ")} - using heuristic analysis`;
  }
  return "all tools available";
}

export type ToolContext = {
  runner: ToolRunner;
  timeoutMs: number;
};

/**
 * Writes `content` to a fresh temp file, hands its path to `fn` and removes
 * the directory afterwards.
 */
export function withSourceFile<T>(content: string, fn: (filePath: string) => T): T {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pyrefine-"));
  const filePath = path.join(dir, "source.py");
  try {
    fs.writeFileSync(filePath, content, "utf-8");
    return fn(filePath);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Runs a tool and throws ToolInvocationError unless it started, finished in
 * time and exited with one of `okExitCodes`.
 */
export function invokeTool(
  context: ToolContext,
  tool: ExternalTool,
  args: string[],
  okExitCodes: number[] = [0]
): ToolRunResult {
  const result = context.runner(tool, args, context.timeoutMs);
  if (result.error) {
    throw new ToolInvocationError(tool, result.error.message);
  }
  if (result.exitCode === null) {
    throw new ToolInvocationError(tool, "terminated before completing");
  }
  if (!okExitCodes.includes(result.exitCode)) {
    const stderr = result.stderr.trim();
    throw new ToolInvocationError(tool, `exited with code ${result.exitCode}${stderr ? `\nstderr: ${stderr}` : ""}`);
  }
  return result;
}
