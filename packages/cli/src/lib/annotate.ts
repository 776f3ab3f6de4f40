// packages/cli/src/lib/annotate.ts

import type { GeneratedMetadata } from "@headmeta/shared";
import {
  HEAD_KEY,
  hasHeadMetadata,
  mergeHeadMetadata,
  parseDocument,
  serializeDocument,
} from "@headmeta/shared";
import { readMarkdownFile } from "./input.js";

export interface AnnotateOptions {
  /** Replace existing head metadata */
  override: boolean;
}

/** Produces metadata for a document body */
export type MetadataSource = (body: string) => Promise<GeneratedMetadata>;

export type AnnotateResult =
  | { status: "updated"; document: string; metadata: GeneratedMetadata }
  | { status: "skipped"; document: string; reason: string };

/**
 * Add generated head metadata to a markdown document.
 * Existing head metadata without override skips the document before
 * any metadata is requested, returning the original text.
 */
export async function annotateDocument(
  raw: string,
  options: AnnotateOptions,
  source: MetadataSource
): Promise<AnnotateResult> {
  const { frontmatter, body } = parseDocument(raw);

  if (hasHeadMetadata(frontmatter) && !options.override) {
    return {
      status: "skipped",
      document: raw,
      reason: `'${HEAD_KEY}' is already set up`,
    };
  }

  const metadata = await source(body);
  const outcome = mergeHeadMetadata(frontmatter, metadata, options);

  if (outcome.status === "skipped") {
    return { status: "skipped", document: raw, reason: outcome.reason };
  }

  return {
    status: "updated",
    document: serializeDocument({ frontmatter: outcome.frontmatter, body }),
    metadata,
  };
}

export async function annotateFile(
  filePath: string,
  options: AnnotateOptions,
  source: MetadataSource
): Promise<AnnotateResult> {
  const raw = readMarkdownFile(filePath);
  return annotateDocument(raw, options, source);
}
