// packages/shared/src/types.ts

import type { Document } from "yaml";

/** Decoded front-matter block; the YAML document keeps key order and comments */
export type FrontMatter = Document;

/** A document split into its front matter and body */
export interface ParsedDocument {
  /** Decoded front matter, or null when the document has none */
  frontmatter: FrontMatter | null;
  /** Text after the closing fence, passed through untouched */
  body: string;
}

/** Metadata produced by the completion endpoint for one document */
export interface GeneratedMetadata {
  description: string;
  keywords: string[];
}

/** The `head` mapping as written into front matter */
export interface HeadMetadata extends GeneratedMetadata {
  [key: string]: unknown;
}

/** Result of folding generated metadata into front matter */
export type MergeOutcome =
  | { status: "updated"; frontmatter: FrontMatter }
  | { status: "skipped"; frontmatter: FrontMatter; reason: string };

/** Error codes */
export type ErrorCode =
  | "FILE_NOT_FOUND"
  | "MALFORMED_FRONTMATTER"
  | "MISSING_CREDENTIAL"
  | "COMPLETION_REQUEST_FAILED"
  | "INVALID_COMPLETION_RESPONSE"
  | "INVALID_OPTION"
  | "INVALID_CONFIG"
  | "WRITE_FAILED";

/** CLI global options */
export interface GlobalOptions {
  quiet?: boolean;
}
