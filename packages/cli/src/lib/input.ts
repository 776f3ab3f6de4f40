// packages/cli/src/lib/input.ts

import { existsSync, readFileSync, statSync } from "node:fs";
import { fileNotFound } from "@headmeta/shared";

/**
 * Read a markdown file as UTF-8 text.
 * Missing paths and directories are reported as FILE_NOT_FOUND.
 */
export function readMarkdownFile(filePath: string): string {
  if (!existsSync(filePath) || !statSync(filePath).isFile()) {
    throw fileNotFound(filePath);
  }
  return readFileSync(filePath, "utf-8");
}
