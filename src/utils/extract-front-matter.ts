/**
 * Front-Matter Extractor
 * Splits a leading fenced metadata block from the body of a file
 */

import type { FrontMatterSplit } from "../types/files.js";

const FENCE = "---";

interface Line {
  content: string; // Line text without its terminator
  end: number; // Index where the terminator starts
  next: number; // Index of the following line
}

function readLine(text: string, start: number): Line {
  const newline = text.indexOf("\n", start);
  const next = newline === -1 ? text.length : newline + 1;
  let end = newline === -1 ? text.length : newline;

  // Tolerate CRLF
  if (end > start && text[end - 1] === "\r") {
    end--;
  }

  return { content: text.slice(start, end), end, next };
}

/**
 * Split `text` into its front-matter block and body
 *
 * The block must open on the very first line with a fence line and be
 * closed by a later fence line. Without a closing fence nothing is
 * consumed and the whole text is the body.
 *
 * @example
 * extractFrontMatter("---\ntitle: A\n---\nbody text")
 * // { matter: "title: A", body: "body text" }
 * extractFrontMatter("---\ntitle: A\nbody text")
 * // { matter: "", body: "---\ntitle: A\nbody text" }
 */
export function extractFrontMatter(text: string): FrontMatterSplit {
  const opening = readLine(text, 0);
  if (opening.content !== FENCE) {
    return { matter: "", body: text };
  }

  let matterEnd = opening.next;
  let cursor = opening.next;

  while (cursor < text.length) {
    const line = readLine(text, cursor);

    if (line.content === FENCE) {
      return {
        matter: text.slice(opening.next, matterEnd),
        body: text.slice(line.next),
      };
    }

    matterEnd = line.end;
    cursor = line.next;
  }

  return { matter: "", body: text };
}
