/**
 * Pipeline data types
 */

import type { BuildConfig } from "./config.js";
import type { FileStore } from "./files.js";

/**
 * Intermediate representation - the only value passed between stages.
 * Between two stages, `files` holds exactly what will be written.
 */
export interface IR {
  readonly files: FileStore;
  readonly config: BuildConfig;
}

/**
 * A transformation stage. Must return a new IR instead of changing its input.
 */
export type Stage = (ir: IR) => IR;

export interface BuildStats {
  filesRead: number;
  filesWritten: number;
  stages: number;
  cleaned: boolean;
  // Milliseconds from build() start to the last write
  duration: number;
}
