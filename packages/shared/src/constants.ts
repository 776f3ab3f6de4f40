// packages/shared/src/constants.ts

/** Fence line that opens and closes a front-matter block */
export const FENCE = "---";

/** Front-matter key holding the generated head metadata */
export const HEAD_KEY = "head";

/** Config directory path (relative to home) */
export const CONFIG_DIR = ".headmeta";

/** Config file name */
export const CONFIG_FILE = "config.json";

/** Default completion model */
export const DEFAULT_MODEL = "gpt-4o";

/** Default sampling temperature */
export const DEFAULT_TEMPERATURE = 0.7;
