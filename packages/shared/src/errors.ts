// packages/shared/src/errors.ts

import type { ErrorCode } from "./types.js";

export class HeadmetaError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HeadmetaError";
  }
}

export function fileNotFound(path: string): HeadmetaError {
  return new HeadmetaError("FILE_NOT_FOUND", `File not found: ${path}`);
}

export function malformedFrontmatter(detail: string): HeadmetaError {
  return new HeadmetaError("MALFORMED_FRONTMATTER", `Malformed front matter: ${detail}`);
}

export function missingCredential(envKey: string): HeadmetaError {
  return new HeadmetaError(
    "MISSING_CREDENTIAL",
    `The environment variable ${envKey} is not set.`
  );
}

export function completionRequestFailed(cause: unknown): HeadmetaError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new HeadmetaError(
    "COMPLETION_REQUEST_FAILED",
    `Completion request failed: ${detail}`,
    { cause }
  );
}

export function invalidCompletionResponse(detail: string): HeadmetaError {
  return new HeadmetaError(
    "INVALID_COMPLETION_RESPONSE",
    `Invalid completion response: ${detail}`
  );
}

export function invalidOption(name: string, value: string, expected: string): HeadmetaError {
  return new HeadmetaError("INVALID_OPTION", `Invalid ${name}: ${value}. Expected ${expected}`);
}

export function invalidConfig(path: string, detail: string): HeadmetaError {
  return new HeadmetaError("INVALID_CONFIG", `Invalid config file ${path}: ${detail}`);
}

export function writeFailed(path: string, cause: unknown): HeadmetaError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new HeadmetaError("WRITE_FAILED", `Failed to write ${path}: ${detail}`, { cause });
}
