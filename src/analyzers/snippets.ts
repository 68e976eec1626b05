import { createTwoFilesPatch } from "diff";

import { defaults } from "../config";

const DEFINITION_PREFIXES = ["def ", "async def ", "class "];

/**
 * A representative window of the file: the whole file when it is short,
 * otherwise `maxLines` lines from the first function or class definition,
 * otherwise the leading lines.
 */
export function extractSnippet(content: string, maxLines: number = defaults.snippetMaxLines): string {
  const lines = content.split("\n");
  if (lines.length <= maxLines) {
    return content;
  }

  const start = lines.findIndex((line) => {
    const trimmed = line.trim();
    return DEFINITION_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
  });

  if (start >= 0) {
    return lines.slice(start, start + maxLines).join("\n");
  }
  return lines.slice(0, maxLines).join("\n");
}

export function generatePatch(original: string, modified: string, filePath: string): string {
  return createTwoFilesPatch(`a/${filePath}`, `b/${filePath}`, original, modified);
}
