// packages/shared/src/head.ts

import { isMap } from "yaml";
import { HEAD_KEY } from "./constants.js";
import { emptyFrontMatter } from "./frontmatter.js";
import type { FrontMatter, GeneratedMetadata, HeadMetadata, MergeOutcome } from "./types.js";

export interface MergeOptions {
  /** Replace description and keywords when head metadata already exists */
  override: boolean;
}

/** Whether the front matter already carries a head entry */
export function hasHeadMetadata(frontmatter: FrontMatter | null): boolean {
  return frontmatter !== null && frontmatter.has(HEAD_KEY);
}

/**
 * Fold generated metadata into front matter without mutating either input.
 *
 * An existing head mapping keeps its other fields and key order; only
 * description and keywords change, and a description keeps its scalar
 * style. A head in any other shape (such as a list of meta tag tuples)
 * is replaced outright.
 */
export function mergeHeadMetadata(
  frontmatter: FrontMatter | null,
  generated: GeneratedMetadata,
  options: MergeOptions
): MergeOutcome {
  const doc = frontmatter === null ? emptyFrontMatter() : frontmatter.clone();
  const fields: HeadMetadata = {
    description: generated.description,
    keywords: [...generated.keywords],
  };

  if (!doc.has(HEAD_KEY)) {
    doc.set(HEAD_KEY, doc.createNode(fields));
    return { status: "updated", frontmatter: doc };
  }

  if (!options.override) {
    return {
      status: "skipped",
      frontmatter: doc,
      reason: `'${HEAD_KEY}' is already set up`,
    };
  }

  const head = doc.get(HEAD_KEY, true);
  if (isMap(head)) {
    head.set("description", fields.description);
    head.set("keywords", doc.createNode(fields.keywords));
  } else {
    doc.set(HEAD_KEY, doc.createNode(fields));
  }

  return { status: "updated", frontmatter: doc };
}
