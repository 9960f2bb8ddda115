/**
 * Reader Module
 * Loads files into a file store, splitting off their front matter
 */

import { readFileSync } from "node:fs";
import { BuildError } from "../utils/build-error.js";
import { createFileStore } from "../utils/create-file-store.js";
import { extractFrontMatter } from "../utils/extract-front-matter.js";
import { parseFrontMatter } from "../utils/parse-front-matter.js";
import { toRelativeKey } from "../utils/to-relative-key.js";
import type { BuildConfig, FileRecord, FileStore } from "../types/index.js";

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function readText(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    throw new BuildError("read-error", `Unable to read ${filePath}`, {
      path: filePath,
      cause: error,
    });
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new BuildError("read-error", `${filePath} is not valid UTF-8 text`, {
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Turn one file's text into its record
 * With front matter disabled the text is kept whole and metadata is empty.
 */
export function toFileRecord(
  text: string,
  config: BuildConfig,
  key: string,
): FileRecord {
  if (!config.frontmatter) {
    return { frontmatter: [], content: Buffer.from(text, "utf-8") };
  }

  const { matter, body } = extractFrontMatter(text);
  return {
    frontmatter: parseFrontMatter(matter, key),
    content: Buffer.from(body, "utf-8"),
  };
}

/**
 * Read `files` (absolute paths under config.source) into a new store
 * keyed by their source-relative paths. Aborts on the first failure.
 */
export function read(config: BuildConfig, files: readonly string[]): FileStore {
  const entries = files.map((filePath): [string, FileRecord] => {
    const key = toRelativeKey(config.source, filePath);
    return [key, toFileRecord(readText(filePath), config, key)];
  });

  return createFileStore(entries);
}
