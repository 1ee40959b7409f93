/**
 * CLI argument parser
 */

import { isLiteralStyle } from "@binembed/emitter";
import { isDuplicateNamePolicy } from "../config.js";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  /** Positional arguments after the command */
  inputs: string[];
  options: CliOptions;
  /** Set when an option is unknown or its value is missing or invalid */
  usageError?: string;
};

const parseCount = (value: string): number | undefined =>
  /^\d+$/.test(value) ? Number(value) : undefined;

const VALUE_OPTIONS: ReadonlySet<string> = new Set([
  "-c",
  "--config",
  "-d",
  "--dir",
  "-o",
  "--out",
  "-n",
  "-ns",
  "--namespace",
  "-s",
  "--style",
  "-w",
  "--line-width",
  "-r",
  "--row-size",
  "--on-duplicate",
]);

/**
 * Store the value of an option that takes one.
 * Returns a usage error when the value is not acceptable.
 */
const applyValueOption = (
  options: CliOptions,
  option: string,
  value: string
): string | undefined => {
  switch (option) {
    case "-c":
    case "--config":
      options.config = value;
      return undefined;
    case "-d":
    case "--dir":
      options.dir = value;
      return undefined;
    case "-o":
    case "--out":
      options.out = value;
      return undefined;
    case "-n":
    case "-ns":
    case "--namespace":
      options.namespace = value;
      return undefined;
    case "-s":
    case "--style":
      if (!isLiteralStyle(value)) {
        return `Unknown style '${value}' (expected string or bytes)`;
      }
      options.style = value;
      return undefined;
    case "-w":
    case "--line-width":
      options.lineWidth = parseCount(value);
      return options.lineWidth === undefined
        ? `Line width must be a number, got '${value}'`
        : undefined;
    case "-r":
    case "--row-size":
      options.rowSize = parseCount(value);
      return options.rowSize === undefined
        ? `Row size must be a number, got '${value}'`
        : undefined;
    case "--on-duplicate":
      if (!isDuplicateNamePolicy(value)) {
        return `Unknown duplicate policy '${value}' (expected overwrite or error)`;
      }
      options.onDuplicate = value;
      return undefined;
    default:
      return `Unknown option '${option}'`;
  }
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const inputs: string[] = [];
  let usageError: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    if (!arg.startsWith("-")) {
      inputs.push(arg);
      continue;
    }

    if (VALUE_OPTIONS.has(arg)) {
      // An option never takes another option as its value
      const value = args[i + 1];
      if (value === undefined || value.startsWith("-")) {
        usageError = `Missing value for ${arg}`;
        break;
      }
      i++;
      usageError = applyValueOption(options, arg, value);
      if (usageError !== undefined) break;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", inputs: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", inputs: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      default:
        usageError = `Unknown option '${arg}'`;
    }

    if (usageError !== undefined) {
      break;
    }
  }

  return usageError === undefined
    ? { command, inputs, options }
    : { command, inputs, options, usageError };
};
