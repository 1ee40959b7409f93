/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, EXIT_CODES, showHelp, parseArgs, runCli } from "./cli/index.js";
export type { ParsedArgs } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export { generateCommand, type GenerateSummary } from "./commands/generate.js";
export { listCommand } from "./commands/list.js";
export { inspectCommand } from "./commands/inspect.js";
