/**
 * File-related type definitions
 */

import type { Map as ImmutableMap } from "immutable";

/**
 * One parsed front-matter document. Whatever the YAML parser produced:
 * usually a plain object, but scalars and sequences are valid documents too.
 */
export type FrontMatterDocument = unknown;

/**
 * In-memory representation of one file. Identity is its key in the store.
 */
export interface FileRecord {
  // Parsed front-matter documents, in order (empty when there is none)
  readonly frontmatter: readonly FrontMatterDocument[];
  // Raw bytes with the front matter stripped
  readonly content: Buffer;
}

/**
 * Root-relative path ("posts/a.md", always "/"-separated) to file record.
 * Persistent map: every update returns a new store sharing the
 * untouched entries with the old one.
 */
export type FileStore = ImmutableMap<string, FileRecord>;

/**
 * Result of splitting a file's text on its front-matter fences
 */
export interface FrontMatterSplit {
  // Text strictly between the fence lines ("" when there is no block)
  matter: string;
  // Everything after the closing fence line, or the whole text
  body: string;
}
