/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  PartialProjectConfig,
  ProjectConfig,
} from "../types/config.js";
import {
  PartialProjectConfigSchema,
  ProjectConfigSchema,
} from "../types/config.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("kiln", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/kiln or ~/.config/kiln
 * - macOS: ~/Library/Preferences/kiln
 * - Windows: %APPDATA%\kiln\Config
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 * Lives in config/ at the package root, two levels above this file
 * both in src/ and in dist/
 */
export async function loadDefaultConfig(): Promise<ProjectConfig> {
  const defaultConfigPath = join(__dirname, "..", "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ProjectConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable, not JSON, or does not match the schema
 */
export async function loadConfigFile(
  configPath: string,
): Promise<PartialProjectConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialProjectConfigSchema.parse(JSON.parse(content));
}

/**
 * Load user configuration from OS-specific directory
 * Returns null when the user has not created one
 */
async function loadUserConfig(): Promise<PartialProjectConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadConfigFile(userConfigPath);
}

/**
 * Overlay `override` on `base`; ignore lists are concatenated
 */
export function mergeConfig(
  base: ProjectConfig,
  override: PartialProjectConfig,
): ProjectConfig {
  return {
    ...base,
    ...override,
    ignores: [...new Set([...base.ignores, ...(override.ignores ?? [])])],
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ProjectConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load or validate is skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadConfigFile(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
