/**
 * Scanner Module
 * Discovers every regular file under the source root
 */

import glob from "fast-glob";
import { statSync } from "node:fs";
import { BuildError } from "../utils/build-error.js";
import type { BuildConfig } from "../types/index.js";

/**
 * List the files a build reads, as absolute paths
 *
 * Reads from config:
 * - source: root of the walk
 * - ignores: glob patterns (relative to source) that are left out
 *
 * Dotfiles are included; directories are not. The list is sorted so
 * reads happen in a stable order.
 */
export function scan(config: BuildConfig): string[] {
  // fast-glob reports a missing cwd as an empty result
  try {
    if (!statSync(config.source).isDirectory()) {
      throw new Error(`${config.source} is not a directory`);
    }

    const files = glob.sync("**/*", {
      cwd: config.source,
      absolute: true,
      onlyFiles: true,
      dot: true,
      ignore: [...config.ignores],
    });

    return files.sort();
  } catch (error) {
    throw new BuildError("read-error", `Unable to scan ${config.source}`, {
      path: config.source,
      cause: error,
    });
  }
}
