/**
 * Front-Matter Parser
 * Hands an extracted block to the YAML parser
 */

import { loadAll } from "js-yaml";
import type { FrontMatterDocument } from "../types/files.js";
import { BuildError } from "./build-error.js";

/**
 * Parse a front-matter block into its ordered list of YAML documents
 *
 * A blank block yields no documents. Malformed YAML is a fatal build
 * error naming the file it came from.
 *
 * @example
 * parseFrontMatter("title: A") // [{ title: "A" }]
 * parseFrontMatter("") // []
 */
export function parseFrontMatter(
  matter: string,
  path?: string,
): FrontMatterDocument[] {
  if (matter.trim() === "") {
    return [];
  }

  try {
    return loadAll(matter, null, { filename: path });
  } catch (error) {
    const where = path ?? "front matter";
    throw new BuildError("parse-error", `Invalid front matter in ${where}`, {
      path,
      cause: error,
    });
  }
}
