// packages/shared/src/frontmatter.ts
// Front-matter parsing and serialization for markdown documents

import matter from "gray-matter";
import YAML, { Document, isMap, isScalar } from "yaml";
import { FENCE } from "./constants.js";
import { malformedFrontmatter } from "./errors.js";
import type { FrontMatter, ParsedDocument } from "./types.js";

// Integers beyond 2^53 survive only as bigint
const DOCUMENT_OPTIONS = { intAsBigInt: true } as const;

const YAML_OPTIONS = {
  indent: 2,
  indentSeq: true,
  lineWidth: 0,
} as const;

/**
 * gray-matter hands over the block starting with the opening fence's line
 * break and cut at "\n---", so a CRLF block still ends in "\r". Line
 * breaks are normalized and the fence's own break dropped before decoding.
 */
function parseBlock(input: string): object {
  const source = input.replace(/\r\n?/g, "\n").replace(/^\n/, "");
  const doc = YAML.parseDocument(source, DOCUMENT_OPTIONS);
  if (doc.errors.length > 0) {
    throw doc.errors[0];
  }
  return doc;
}

/**
 * The block is kept as a YAML document rather than a plain object, so
 * key order, comments, scalar styles and large integers are written back
 * as they were read.
 */
const MATTER_OPTIONS = {
  engines: {
    yaml: {
      parse: parseBlock,
    },
  },
};

export function emptyFrontMatter(): FrontMatter {
  return new Document({}, DOCUMENT_OPTIONS);
}

function hasOpeningFence(raw: string): boolean {
  const end = raw.indexOf("\n");
  const firstLine = end === -1 ? raw : raw.slice(0, end);
  return firstLine.trimEnd() === FENCE;
}

/**
 * Same rule gray-matter applies: the first later line starting with the
 * fence closes the block, and anything after the fence on that line
 * (as in "---x") starts the body.
 */
function hasClosingFence(raw: string): boolean {
  return raw
    .split("\n")
    .slice(1)
    .some((line) => line.startsWith(FENCE));
}

function decode(raw: string): { data: unknown; content: string } {
  try {
    const file = matter(raw, MATTER_OPTIONS);
    return { data: file.data, content: file.content };
  } catch (err) {
    throw malformedFrontmatter(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Split a markdown document into its front matter and body.
 *
 * A document whose first line is not a fence has no front matter: the
 * whole text is returned as the body. A fence that is opened but never
 * closed, or a block that does not decode to a mapping, throws a
 * MALFORMED_FRONTMATTER error. The line break ending the closing fence
 * is not part of the body.
 */
export function parseDocument(raw: string): ParsedDocument {
  if (!hasOpeningFence(raw)) {
    return { frontmatter: null, body: raw };
  }

  if (!hasClosingFence(raw)) {
    throw malformedFrontmatter(`opening "${FENCE}" is never closed`);
  }

  const { data, content } = decode(raw);

  // gray-matter skips the engine for empty and comment-only blocks
  if (!(data instanceof Document)) {
    return { frontmatter: emptyFrontMatter(), body: content };
  }

  const contents = data.contents;
  if (contents === null || (isScalar(contents) && contents.value === null)) {
    return { frontmatter: emptyFrontMatter(), body: content };
  }

  if (!isMap(contents)) {
    throw malformedFrontmatter("expected a mapping of keys to values");
  }

  return { frontmatter: data, body: content };
}

/**
 * Render front matter and body back into document text.
 *
 * Without front matter the body is returned as is. Otherwise the closing
 * fence is always followed by exactly one line break and the body is
 * appended verbatim, so re-serializing a parsed document reproduces it
 * whenever its YAML is in this canonical layout.
 */
export function serializeDocument(doc: ParsedDocument): string {
  if (doc.frontmatter === null) {
    return doc.body;
  }

  const contents = doc.frontmatter.contents;
  const block =
    isMap(contents) && contents.items.length === 0
      ? ""
      : doc.frontmatter.toString(YAML_OPTIONS);

  return `${FENCE}\n${block}${FENCE}\n${doc.body}`;
}
