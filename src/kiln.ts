/**
 * Build Orchestrator
 * Holds the configuration and stages of a build, and runs
 * clean → read → pipeline → write
 */

import { mkdirSync, realpathSync, statSync } from "node:fs";
import path from "node:path";
import { Pipeline } from "./pipeline.js";
import * as modules from "./modules/index.js";
import { BuildError } from "./utils/build-error.js";
import type { Logger } from "./utils/logger.js";
import {
  createDefaultBuildConfig,
  type BuildConfig,
  type BuildStats,
  type IR,
  type Stage,
} from "./types/index.js";

export interface KilnOptions {
  logger?: Logger;
}

export class Kiln {
  private settings: BuildConfig = createDefaultBuildConfig();
  private readonly pipeline: Pipeline;
  private readonly logger?: Logger;
  private lastStats?: BuildStats;

  constructor(options: KilnOptions = {}) {
    this.logger = options.logger;
    this.pipeline = new Pipeline(options.logger);
  }

  /**
   * Snapshot of the current configuration
   */
  get config(): BuildConfig {
    return Object.freeze({
      ...this.settings,
      ignores: Object.freeze([...this.settings.ignores]),
    });
  }

  /**
   * Statistics of the last successful build
   */
  get stats(): BuildStats | undefined {
    return this.lastStats;
  }

  /**
   * Add glob patterns (relative to the source root) to leave out of the read
   */
  ignores(patterns: readonly string[]): void {
    const ignores = [...new Set([...this.settings.ignores, ...patterns])];
    this.settings = { ...this.settings, ignores };
  }

  /**
   * Set the directory to read. It must exist; symlinks are resolved.
   */
  source(dir: string): void {
    const resolved = path.resolve(dir);
    let canonical: string;
    try {
      canonical = realpathSync(resolved);
    } catch (error) {
      throw new BuildError("invalid-source", `Source ${resolved} does not exist`, {
        path: resolved,
        cause: error,
      });
    }

    if (!statSync(canonical).isDirectory()) {
      throw new BuildError(
        "invalid-source",
        `Source ${canonical} is not a directory`,
        { path: canonical },
      );
    }

    this.settings = { ...this.settings, source: canonical };
  }

  /**
   * Set the directory to write, creating it when missing
   */
  destination(dir: string): void {
    const resolved = path.resolve(dir);
    try {
      mkdirSync(resolved, { recursive: true });
    } catch (error) {
      throw new BuildError("mkdir-error", `Unable to create ${resolved}`, {
        path: resolved,
        cause: error,
      });
    }

    this.settings = { ...this.settings, destination: realpathSync(resolved) };
  }

  clean(enabled: boolean): void {
    this.settings = { ...this.settings, clean: enabled };
  }

  frontmatter(enabled: boolean): void {
    this.settings = { ...this.settings, frontmatter: enabled };
  }

  register(stage: Stage): void {
    this.pipeline.register(stage);
  }

  /**
   * Run the build and return the IR that was written
   *
   * Throws a BuildError on any clean, read, parse or write failure.
   * Errors thrown by stages reach the caller as they are.
   */
  build(): IR {
    const startTime = Date.now();
    const config = this.config;

    if (!config.source || !config.destination) {
      throw new BuildError(
        "invalid-config",
        "Both source and destination must be set before building",
      );
    }

    if (config.clean) {
      this.logger?.debug(`Cleaning ${config.destination}`);
      modules.clean(config);
    }

    this.logger?.debug(`Reading ${config.source}`);
    const paths = modules.scan(config);
    const loaded: IR = { files: modules.read(config, paths), config };
    this.logger?.info(`Read ${loaded.files.size} files`);

    const result = this.pipeline.run(loaded);

    this.logger?.debug(`Writing ${config.destination}`);
    const written = modules.write(result, config.destination);
    this.logger?.info(`Wrote ${written} files to ${config.destination}`);

    this.lastStats = {
      filesRead: loaded.files.size,
      filesWritten: written,
      stages: this.pipeline.size,
      cleaned: config.clean,
      duration: Date.now() - startTime,
    };

    return result;
  }
}
