/**
 * Writer Module
 * Materializes the final file store into the destination directory
 */

import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { BuildError } from "../utils/build-error.js";
import type { IR } from "../types/index.js";

/**
 * Write every record of `ir.files` to `destination/<key>`
 *
 * Parent directories are created on demand, so directories without
 * entries never appear. Existing files are truncated; files that are
 * not in the store are left alone. A key that resolves outside the
 * destination is a write-error. Returns the number of files written.
 */
export function write(ir: IR, destination: string): number {
  let written = 0;

  for (const [key, file] of ir.files) {
    const target = path.resolve(destination, ...key.split("/"));
    const relative = path.relative(destination, target);
    const escapes =
      relative === "" ||
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative);
    if (escapes) {
      throw new BuildError(
        "write-error",
        `Refusing to write ${key} outside ${destination}`,
        { path: target },
      );
    }

    const directory = path.dirname(target);

    try {
      mkdirSync(directory, { recursive: true });
    } catch (error) {
      throw new BuildError("mkdir-error", `Unable to create ${directory}`, {
        path: directory,
        cause: error,
      });
    }

    try {
      writeFileSync(target, file.content);
    } catch (error) {
      throw new BuildError("write-error", `Unable to write ${target}`, {
        path: target,
        cause: error,
      });
    }

    written++;
  }

  return written;
}
