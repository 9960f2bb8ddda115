#!/usr/bin/env node

/**
 * CLI entry point for kiln
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { buildCommand } from "./commands/build.js";
import { configCommand } from "./commands/config.js";

const program = new Command();

program
  .name("kiln")
  .description("Read a directory, run it through stages, write the result")
  .version("0.1.0");

// Build command (default action)
program
  .option("-s, --source <path>", "Directory to read")
  .option("-d, --destination <path>", "Directory to write")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-i, --ignore <patterns...>", "Glob patterns to leave out")
  .option("--clean", "Empty the destination before writing")
  .option("--frontmatter", "Parse leading front matter")
  .option("--no-frontmatter", "Keep front matter as part of the content")
  .option("--render", "Render *.hbs files with Handlebars")
  .option("-v, --verbose", "Verbose output")
  .action(buildCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
