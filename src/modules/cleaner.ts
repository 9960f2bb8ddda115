/**
 * Cleaner Module
 * Empties the destination directory before a build reads anything
 */

import { mkdirSync, rmSync } from "node:fs";
import { BuildError } from "../utils/build-error.js";
import type { BuildConfig } from "../types/index.js";

/**
 * Recursively delete the destination (when it exists) and recreate it empty
 *
 * Reads from config:
 * - destination
 */
export function clean(config: BuildConfig): void {
  try {
    rmSync(config.destination, { recursive: true, force: true });
  } catch (error) {
    throw new BuildError(
      "clean-error",
      `Unable to remove ${config.destination}`,
      { path: config.destination, cause: error },
    );
  }

  try {
    mkdirSync(config.destination, { recursive: true });
  } catch (error) {
    throw new BuildError(
      "clean-error",
      `Unable to recreate ${config.destination}`,
      { path: config.destination, cause: error },
    );
  }
}
