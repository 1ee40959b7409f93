/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { type Diagnostic, type Result, ok } from "@binembed/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { listCommand } from "../commands/list.js";
import { inspectCommand } from "../commands/inspect.js";
import type { BinembedConfig, CliOptions, CommandFailure } from "../types.js";
import { EXIT_CODES, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";
import { reportDiagnostic, reportDiagnostics } from "./report.js";

const COMMANDS = new Set(["generate", "list", "inspect"]);

type ProjectConfig = {
  readonly config: BinembedConfig;
  readonly projectRoot: string;
};

/**
 * Config named with --config, else the nearest binembed.json, else none
 */
const loadProjectConfig = (
  options: CliOptions,
  workingDir: string
): Result<ProjectConfig, Diagnostic> => {
  const configPath = options.config
    ? resolve(workingDir, options.config)
    : findConfig(workingDir);

  if (!configPath) {
    return ok({ config: {}, projectRoot: workingDir });
  }

  const loaded = loadConfig(configPath);
  if (!loaded.ok) return loaded;
  return ok({ config: loaded.value, projectRoot: dirname(configPath) });
};

const usageError = (message: string): number => {
  console.error(`Error: ${message}`);
  console.error("Run 'binembed --help' for usage information");
  return EXIT_CODES.usage;
};

const commandFailed = (failure: CommandFailure): number => {
  reportDiagnostics(failure.diagnostics);
  return failure.exitCode;
};

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`binembed v${VERSION}`);
    return EXIT_CODES.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.ok;
  }

  if (!COMMANDS.has(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'binembed --help' for usage information");
    return EXIT_CODES.unknownCommand;
  }

  if (parsed.usageError !== undefined) {
    return usageError(parsed.usageError);
  }

  const workingDir = process.cwd();

  // inspect reads a generated document and needs no config
  if (parsed.command === "inspect") {
    const [documentPath, name, ...rest] = parsed.inputs;
    if (!documentPath || rest.length > 0) {
      return usageError("Usage: binembed inspect <definition.cpp> [name]");
    }
    const result = inspectCommand(resolve(workingDir, documentPath), name, {
      verbose: parsed.options.verbose ?? false,
    });
    return result.ok ? EXIT_CODES.ok : commandFailed(result.error);
  }

  const project = loadProjectConfig(parsed.options, workingDir);
  if (!project.ok) {
    reportDiagnostic(project.error);
    return EXIT_CODES.config;
  }

  const config = resolveConfig(
    project.value.config,
    parsed.options,
    project.value.projectRoot,
    parsed.inputs,
    workingDir
  );
  if (!config.ok) {
    reportDiagnostic(config.error);
    return EXIT_CODES.usage;
  }

  // Dispatch to command handlers
  switch (parsed.command) {
    case "generate": {
      const result = generateCommand(config.value);
      return result.ok ? EXIT_CODES.ok : commandFailed(result.error);
    }

    case "list": {
      const result = listCommand(config.value);
      return result.ok ? EXIT_CODES.ok : commandFailed(result.error);
    }

    default:
      return EXIT_CODES.unknownCommand;
  }
};
