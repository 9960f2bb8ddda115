/**
 * Public API
 */

export { Kiln } from "./kiln.js";
export type { KilnOptions } from "./kiln.js";
export { Pipeline } from "./pipeline.js";
export * from "./types/index.js";
export * from "./stages/index.js";
export {
  BuildError,
  describeError,
  createFileRecord,
  createFileStore,
  extractFrontMatter,
  mergeFiles,
  parseFrontMatter,
  Logger,
  loadConfig,
  getUserConfigPath,
} from "./utils/index.js";
export type { FileUpdates } from "./utils/index.js";
