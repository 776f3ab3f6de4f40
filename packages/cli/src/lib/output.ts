// packages/cli/src/lib/output.ts

import { writeFileSync } from "node:fs";
import chalk from "chalk";
import type { GlobalOptions } from "@headmeta/shared";
import { writeFailed } from "@headmeta/shared";

let globalOptions: GlobalOptions = {};

export function setGlobalOptions(opts: GlobalOptions): void {
  globalOptions = opts;
}

// stdout may carry the document, so every message goes to stderr

/** Output warning message */
export function warn(message: string): void {
  if (globalOptions.quiet) return;
  console.error(chalk.yellow(`Warning: ${message}`));
}

/** Output success message */
export function success(message: string): void {
  if (globalOptions.quiet) return;
  console.error(chalk.green(message));
}

/** Output error message */
export function error(message: string): void {
  console.error(chalk.red(`Error: ${message}`));
}

export interface WriteTarget {
  /** Overwrite the source file instead of printing */
  inplace: boolean;
  path: string;
}

/**
 * Emit a finished document: verbatim to stdout, or over the source file
 * in a single write.
 */
export function writeDocument(text: string, target: WriteTarget): void {
  if (!target.inplace) {
    process.stdout.write(text);
    return;
  }

  try {
    writeFileSync(target.path, text, "utf-8");
  } catch (err) {
    throw writeFailed(target.path, err);
  }
}
