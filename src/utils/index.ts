/**
 * Utility exports
 */

// Front matter
export { extractFrontMatter } from "./extract-front-matter.js";
export { parseFrontMatter } from "./parse-front-matter.js";

// File store
export { createFileStore, createFileRecord } from "./create-file-store.js";
export { mergeFiles } from "./merge-files.js";
export type { FileUpdates } from "./merge-files.js";
export { toRelativeKey } from "./to-relative-key.js";

// Errors
export { BuildError, describeError } from "./build-error.js";

// Config utilities
export {
  loadConfig,
  loadConfigFile,
  loadDefaultConfig,
  getUserConfigPath,
  mergeConfig,
} from "./load-config.js";

// Classes
export { Logger } from "./logger.js";
