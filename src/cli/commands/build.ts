/**
 * Build command - Loads config and runs the build
 */

import ora from "ora";
import { z } from "zod";
import { Kiln } from "../../kiln.js";
import * as modules from "../../modules/index.js";
import { renderTemplates } from "../../stages/index.js";
import { describeError, Logger, loadConfig } from "../../utils/index.js";
import type { ProjectConfig } from "../../types/index.js";

const BuildOptionsSchema = z.object({
  source: z.string().optional(),
  destination: z.string().optional(),
  config: z.string().optional(),
  ignore: z.array(z.string()).optional(),
  clean: z.boolean().optional(),
  frontmatter: z.boolean().optional(),
  render: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type BuildOptions = z.infer<typeof BuildOptionsSchema>;

/**
 * Override loaded configuration with CLI options
 */
export function applyOptions(
  config: ProjectConfig,
  options: BuildOptions,
): ProjectConfig {
  return {
    ...config,
    source: options.source ?? config.source,
    destination: options.destination ?? config.destination,
    ignores: [...new Set([...config.ignores, ...(options.ignore ?? [])])],
    clean: options.clean ?? config.clean,
    frontmatter: options.frontmatter ?? config.frontmatter,
    render: options.render ?? config.render,
    logging: options.verbose ? { level: "debug" } : config.logging,
  };
}

/**
 * Set up a Kiln from resolved configuration
 * Relative paths are taken from the working directory.
 */
export function createKiln(config: ProjectConfig, logger: Logger): Kiln {
  const kiln = new Kiln({ logger });
  kiln.source(config.source);
  kiln.destination(config.destination);
  kiln.ignores(config.ignores);
  kiln.clean(config.clean);
  kiln.frontmatter(config.frontmatter);

  if (config.render) {
    kiln.register(renderTemplates());
  }

  return kiln;
}

export async function buildCommand(opts: BuildOptions): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();

  try {
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then CLI overrides
    const loaded = await loadConfig(options.config);
    const config = applyOptions(loaded.config, options);
    const logger = new Logger(config.logging.level);

    for (const err of loaded.errors) {
      logger.warn(`Skipped config ${err.path}: ${describeError(err.error)}`);
    }

    spinner.text = "Building...";
    const kiln = createKiln(config, logger);
    kiln.build();

    spinner.stop();

    if (kiln.stats) {
      modules.printStats(kiln.stats);
    }
  } catch (error) {
    spinner.fail("Build failed");
    console.error(describeError(error));
    if (error instanceof Error && error.cause) {
      console.error(error.cause);
    }
    process.exit(1);
  }
}
