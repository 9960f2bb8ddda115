/**
 * Middleware Pipeline
 * Ordered list of stages run one after another over the IR
 */

import type { IR, Stage } from "./types/index.js";
import type { Logger } from "./utils/logger.js";

export class Pipeline {
  private readonly stages: Stage[] = [];

  constructor(private readonly logger?: Logger) {}

  /**
   * Append a stage; stages run in the order they were registered
   */
  register(stage: Stage): void {
    this.stages.push(stage);
  }

  get size(): number {
    return this.stages.length;
  }

  /**
   * Feed `ir` to the first stage, each result to the next, and return the last
   * result. A stage that throws aborts the run; the error is not wrapped.
   */
  run(ir: IR): IR {
    return this.stages.reduce((current, stage, index) => {
      const name = stage.name || "anonymous";
      this.logger?.debug(
        `Stage ${index + 1}/${this.stages.length} (${name}): ${current.files.size} files in`,
      );
      return stage(current);
    }, ir);
  }
}
