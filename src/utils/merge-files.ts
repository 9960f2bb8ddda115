import type { FileRecord, FileStore } from "../types/files.js";
import type { IR } from "../types/pipeline.js";
import { createFileStore } from "./create-file-store.js";

export type FileUpdates = FileStore | Iterable<readonly [string, FileRecord]>;

function isFileStore(updates: FileUpdates): updates is FileStore {
  return "merge" in updates && "withMutations" in updates;
}

/**
 * Return a new IR whose store carries every entry of `ir.files`,
 * overwritten by `updates` for the keys they share
 *
 * The input IR is left as it was; unchanged entries are shared.
 *
 * @example
 * const upper = ir.files
 *   .filter((_, path) => path.endsWith(".txt"))
 *   .map((file) => createFileRecord(file.content.toString().toUpperCase(), file.frontmatter));
 * return mergeFiles(ir, upper);
 */
export function mergeFiles(ir: IR, updates: FileUpdates): IR {
  const store = isFileStore(updates) ? updates : createFileStore(updates);
  return { ...ir, files: ir.files.merge(store) };
}
