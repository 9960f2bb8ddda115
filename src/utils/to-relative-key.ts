import path from "node:path";

/**
 * Turn an absolute file path into its store key: relative to `root`,
 * "/"-separated, without a leading "./"
 *
 * @example
 * toRelativeKey("/site", "/site/posts/a.md") // "posts/a.md"
 */
export function toRelativeKey(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join("/");
}
