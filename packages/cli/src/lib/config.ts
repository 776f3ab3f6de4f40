// packages/cli/src/lib/config.ts

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import {
  CONFIG_DIR,
  CONFIG_FILE,
  DEFAULT_MODEL,
  DEFAULT_TEMPERATURE,
  invalidConfig,
  missingCredential,
} from "@headmeta/shared";
import { assertTemperature } from "./completion.js";
import type { CompletionSettings, OpenAICredentials } from "./completion.js";

export const API_KEY_ENV = "OPENAI_API_KEY";
export const BASE_URL_ENV = "OPENAI_BASE_URL";
export const MODEL_ENV = "HEADMETA_MODEL";
export const TEMPERATURE_ENV = "HEADMETA_TEMPERATURE";

export const CONFIG_PATH = join(homedir(), CONFIG_DIR, CONFIG_FILE);

export type Env = Record<string, string | undefined>;

const configSchema = z
  .object({
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(1).optional(),
    baseURL: z.string().url().optional(),
  })
  .strict();

export type HeadmetaConfig = z.infer<typeof configSchema>;

/** Settings given on the command line */
export interface CliSettings {
  model?: string;
  temperature?: number;
}

export interface ResolvedSettings {
  credentials: OpenAICredentials;
  completion: CompletionSettings;
}

export function loadConfig(path: string = CONFIG_PATH): HeadmetaConfig {
  if (!existsSync(path)) {
    return {};
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw invalidConfig(path, err instanceof Error ? err.message : String(err));
  }

  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    throw invalidConfig(
      path,
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ")
    );
  }
  return parsed.data;
}

/** Parse a temperature given as text */
export function parseTemperature(value: string, name = "--temperature"): number {
  const trimmed = value.trim();
  return assertTemperature(trimmed === "" ? Number.NaN : Number(trimmed), name);
}

function envValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function requireCredential(env: Env = process.env): string {
  const apiKey = envValue(env, API_KEY_ENV);
  if (!apiKey) {
    throw missingCredential(API_KEY_ENV);
  }
  return apiKey;
}

/**
 * Resolve the effective settings.
 * Priority: CLI flag > env var > config file > default.
 * The credential comes from the environment only and is checked before
 * the config file is read.
 */
export function resolveSettings(
  cli: CliSettings,
  env: Env = process.env,
  configPath: string = CONFIG_PATH
): ResolvedSettings {
  const apiKey = requireCredential(env);
  const config = loadConfig(configPath);

  const envTemperature = envValue(env, TEMPERATURE_ENV);
  const temperature =
    cli.temperature ??
    (envTemperature !== undefined
      ? parseTemperature(envTemperature, TEMPERATURE_ENV)
      : undefined) ??
    config.temperature ??
    DEFAULT_TEMPERATURE;

  return {
    credentials: {
      apiKey,
      baseURL: envValue(env, BASE_URL_ENV) ?? config.baseURL,
    },
    completion: {
      model: cli.model ?? envValue(env, MODEL_ENV) ?? config.model ?? DEFAULT_MODEL,
      temperature,
    },
  };
}
