/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

/**
 * Settings of a single build. Frozen and copied into the IR when
 * the build starts.
 */
export const BuildConfigSchema = z.object({
  // Glob patterns relative to the source root, deduplicated
  ignores: z.array(z.string()),
  // Absolute path of the directory that is read
  source: z.string(),
  // Absolute path of the directory that is written
  destination: z.string(),
  // Empty the destination before writing
  clean: z.boolean(),
  // Split and parse leading front matter while reading
  frontmatter: z.boolean(),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Shape of config/default.json and of user/custom config files.
 * Paths in here may be relative; the CLI resolves them.
 */
export const ProjectConfigSchema = BuildConfigSchema.extend({
  // Register the bundled Handlebars stage
  render: z.boolean(),
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialProjectConfigSchema = ProjectConfigSchema.partial().extend({
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type BuildConfig = Readonly<
  Omit<z.infer<typeof BuildConfigSchema>, "ignores">
> & { readonly ignores: readonly string[] };
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type PartialProjectConfig = z.infer<typeof PartialProjectConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Zero-argument configuration: valid, but a build refuses to start
 * until source and destination are set.
 */
export function createDefaultBuildConfig(): BuildConfig {
  return {
    ignores: [],
    source: "",
    destination: "",
    clean: false,
    frontmatter: true,
  };
}
