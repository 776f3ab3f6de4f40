// packages/cli/src/commands/annotate.ts

import { Command, InvalidArgumentError } from "commander";
import { DEFAULT_MODEL, DEFAULT_TEMPERATURE, HeadmetaError } from "@headmeta/shared";
import { annotateFile } from "../lib/annotate.js";
import { createOpenAITransport, generateMetadata } from "../lib/completion.js";
import type { CompletionTransport, OpenAICredentials } from "../lib/completion.js";
import { CONFIG_PATH, parseTemperature, resolveSettings } from "../lib/config.js";
import type { Env } from "../lib/config.js";
import { error, success, warn, writeDocument } from "../lib/output.js";

export interface AnnotateCommandOptions {
  model?: string;
  temperature?: number;
  override?: boolean;
  inplace?: boolean;
}

export interface AnnotateDeps {
  env: Env;
  configPath: string;
  createTransport: (credentials: OpenAICredentials) => CompletionTransport;
}

const defaultDeps: AnnotateDeps = {
  env: process.env,
  configPath: CONFIG_PATH,
  createTransport: createOpenAITransport,
};

export function handleError(err: unknown): never {
  if (err instanceof HeadmetaError) {
    error(err.message);
    process.exit(1);
  }
  throw err;
}

function temperatureArg(value: string): number {
  try {
    return parseTemperature(value);
  } catch (err) {
    if (err instanceof HeadmetaError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

export async function runAnnotate(
  filename: string,
  options: AnnotateCommandOptions,
  deps: AnnotateDeps = defaultDeps
): Promise<void> {
  const settings = resolveSettings(
    { model: options.model, temperature: options.temperature },
    deps.env,
    deps.configPath
  );
  const transport = deps.createTransport(settings.credentials);
  const target = { inplace: options.inplace ?? false, path: filename };

  const result = await annotateFile(filename, { override: options.override ?? false }, (body) =>
    generateMetadata(body, settings.completion, transport)
  );

  if (result.status === "skipped") {
    warn(`${result.reason} in ${filename}. Use --override to overwrite.`);
    if (!target.inplace) {
      writeDocument(result.document, target);
    }
    return;
  }

  writeDocument(result.document, target);
  if (target.inplace) {
    success(`Updated ${filename}`);
  }
}

export function annotateCommand(program: Command): void {
  program
    .argument("<filename>", "Markdown file containing front matter")
    .option("-m, --model <model>", `Completion model (default: ${DEFAULT_MODEL})`)
    .option(
      "-t, --temperature <value>",
      `Sampling temperature between 0 and 1 (default: ${DEFAULT_TEMPERATURE})`,
      temperatureArg
    )
    .option("--override", "Override existing head metadata if present")
    .option("--inplace", "Replace content in the file directly")
    .action(async (filename: string, options: AnnotateCommandOptions) => {
      try {
        await runAnnotate(filename, options);
      } catch (err) {
        handleError(err);
      }
    });
}
