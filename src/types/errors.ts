/**
 * Build error type definitions
 */

export type BuildErrorReason =
  | "invalid-config"
  | "invalid-source"
  | "clean-error"
  | "read-error"
  | "parse-error"
  | "mkdir-error"
  | "write-error";

export interface BuildErrorOptions {
  path?: string;
  cause?: unknown;
}
