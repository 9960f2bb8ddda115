import { Map as ImmutableMap } from "immutable";
import type { FileRecord, FileStore, FrontMatterDocument } from "../types/files.js";

/**
 * Build a file store from `[path, record]` pairs (empty when omitted)
 */
export function createFileStore(
  entries: Iterable<readonly [string, FileRecord]> = [],
): FileStore {
  return ImmutableMap<string, FileRecord>().withMutations((store) => {
    for (const [path, record] of entries) {
      store.set(path, record);
    }
  });
}

/**
 * Build a file record. String content is stored as UTF-8 bytes.
 */
export function createFileRecord(
  content: string | Buffer,
  frontmatter: readonly FrontMatterDocument[] = [],
): FileRecord {
  return {
    frontmatter,
    content: typeof content === "string" ? Buffer.from(content, "utf-8") : content,
  };
}
