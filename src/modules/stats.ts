/**
 * Stats Module
 * Displays build statistics
 */

import chalk from "chalk";
import type { BuildStats } from "../types/index.js";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the summary of a finished build
 */
export function printStats(stats: BuildStats): void {
  console.log("");
  console.log(
    `  ${chalk.green("✔")} ${chalk.bold("Build Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  console.log(sectionHeader("Files"));
  console.log(statRow(chalk.cyan("◉"), "Read", stats.filesRead, chalk.cyan));
  console.log(
    statRow(chalk.green("◉"), "Written", stats.filesWritten, chalk.green),
  );

  const dropped = stats.filesRead - stats.filesWritten;
  if (dropped > 0) {
    console.log(statRow(chalk.yellow("◉"), "Dropped", dropped, chalk.yellow));
  }

  console.log(sectionHeader("Pipeline"));
  console.log(statRow(chalk.cyan("◉"), "Stages", stats.stages));
  console.log(
    statRow(chalk.cyan("◉"), "Destination", stats.cleaned ? "cleaned" : "kept"),
  );

  console.log("");
}
