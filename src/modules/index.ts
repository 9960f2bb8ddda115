/**
 * Build phase exports
 */

export { clean } from "./cleaner.js";
export { scan } from "./scanner.js";
export { read, toFileRecord } from "./reader.js";
export { write } from "./writer.js";
export { printStats, formatDuration } from "./stats.js";
