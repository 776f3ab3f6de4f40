// packages/shared/src/index.ts

export const VERSION = "0.1.0";

export * from "./constants.js";
export * from "./errors.js";
export * from "./frontmatter.js";
export * from "./head.js";
export * from "./types.js";
