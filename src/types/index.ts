/**
 * Central type exports
 */

// Configuration
export type {
  BuildConfig,
  ConfigError,
  LogLevel,
  PartialProjectConfig,
  ProjectConfig,
} from "./config.js";
export {
  BuildConfigSchema,
  LogLevelSchema,
  PartialProjectConfigSchema,
  ProjectConfigSchema,
  createDefaultBuildConfig,
} from "./config.js";

// Files
export type {
  FileRecord,
  FileStore,
  FrontMatterDocument,
  FrontMatterSplit,
} from "./files.js";

// Pipeline
export type { BuildStats, IR, Stage } from "./pipeline.js";

// Errors
export type { BuildErrorOptions, BuildErrorReason } from "./errors.js";
