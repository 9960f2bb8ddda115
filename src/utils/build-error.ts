import type { BuildErrorOptions, BuildErrorReason } from "../types/errors.js";

/**
 * Fatal build failure. Wraps the underlying filesystem or YAML error
 * as `cause` and keeps its errno code when there is one.
 */
export class BuildError extends Error {
  readonly reason: BuildErrorReason;
  readonly path?: string;
  readonly code?: string;

  constructor(
    reason: BuildErrorReason,
    message: string,
    options: BuildErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "BuildError";
    this.reason = reason;
    this.path = options.path;
    this.code = errorCode(options.cause);
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Format any thrown value as a single line
 *
 * @example
 * describeError(new BuildError("read-error", "Unable to read a.md", { cause: enoent }))
 * // "read-error: Unable to read a.md (ENOENT)"
 */
export function describeError(error: unknown): string {
  if (error instanceof BuildError) {
    const code = error.code ? ` (${error.code})` : "";
    return `${error.reason}: ${error.message}${code}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
