/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  createDiagnostic,
  describeError,
  error,
  ok,
  validateNamespace,
  type Diagnostic,
  type Result,
} from "@binembed/frontend";
import {
  DEFAULT_ENCODER_OPTIONS,
  isLiteralStyle,
  validateEncoderOptions,
  type DuplicateNamePolicy,
} from "@binembed/emitter";
import type { BinembedConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "binembed.json";

export const DEFAULT_OUTPUT_NAME = "embedded_files";

/**
 * The output name becomes both file names and the verbatim `#include` line,
 * so it may not carry a quote, a line break or a path separator.
 */
export const validateOutputName = (
  outputName: string
): Result<string, Diagnostic> =>
  /["\r\n/\\]/.test(outputName)
    ? error(
        createDiagnostic(
          "EMB2004",
          "error",
          `Invalid output name '${outputName}': it may not contain '"', a line break, '/' or '\\'`,
          undefined,
          "Use --dir to choose the output directory"
        )
      )
    : ok(outputName);

export const isDuplicateNamePolicy = (
  value: unknown
): value is DuplicateNamePolicy => value === "overwrite" || value === "error";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isString = (value: unknown): value is string => typeof value === "string";

const isNumber = (value: unknown): value is number => typeof value === "number";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every(isString);

const invalid = (configPath: string, message: string): Diagnostic =>
  createDiagnostic("EMB9002", "error", message, configPath);

/**
 * Read one optional field, checking its type
 */
const field = <T>(
  record: Readonly<Record<string, unknown>>,
  name: string,
  guard: (value: unknown) => value is T,
  expected: string,
  configPath: string
): Result<T | undefined, Diagnostic> => {
  const value = record[name];
  if (value === undefined || guard(value)) {
    return ok(value);
  }
  return error(
    invalid(configPath, `${CONFIG_FILE_NAME}: '${name}' must be ${expected}`)
  );
};

/**
 * Check the parsed JSON of a config file
 */
export const parseConfig = (
  value: unknown,
  configPath: string
): Result<BinembedConfig, Diagnostic> => {
  if (!isRecord(value)) {
    return error(invalid(configPath, `${CONFIG_FILE_NAME}: expected a JSON object`));
  }

  const schema = field(value, "$schema", isString, "a string", configPath);
  if (!schema.ok) return schema;
  const inputs = field(value, "inputs", isStringArray, "an array of strings", configPath);
  if (!inputs.ok) return inputs;
  const outputDirectory = field(value, "outputDirectory", isString, "a string", configPath);
  if (!outputDirectory.ok) return outputDirectory;
  const outputName = field(value, "outputName", isString, "a string", configPath);
  if (!outputName.ok) return outputName;
  const namespace = field(value, "namespace", isString, "a string", configPath);
  if (!namespace.ok) return namespace;
  const style = field(value, "style", isLiteralStyle, "'string' or 'bytes'", configPath);
  if (!style.ok) return style;
  const lineWidth = field(value, "lineWidth", isNumber, "a number", configPath);
  if (!lineWidth.ok) return lineWidth;
  const rowSize = field(value, "rowSize", isNumber, "a number", configPath);
  if (!rowSize.ok) return rowSize;
  const duplicateNames = field(
    value,
    "duplicateNames",
    isDuplicateNamePolicy,
    "'overwrite' or 'error'",
    configPath
  );
  if (!duplicateNames.ok) return duplicateNames;

  return ok({
    $schema: schema.value,
    inputs: inputs.value,
    outputDirectory: outputDirectory.value,
    outputName: outputName.value,
    namespace: namespace.value,
    style: style.value,
    lineWidth: lineWidth.value,
    rowSize: rowSize.value,
    duplicateNames: duplicateNames.value,
  });
};

/**
 * Load binembed.json
 */
export const loadConfig = (
  configPath: string
): Result<BinembedConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "EMB9001",
        "error",
        `Config file not found: ${configPath}`
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return error(
      invalid(configPath, `Failed to parse ${CONFIG_FILE_NAME}: ${describeError(err)}`)
    );
  }

  return parseConfig(parsed, configPath);
};

/**
 * Find binembed.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from the config file and CLI options.
 * CLI values win over the file, and the file over the defaults. Paths from
 * the file are relative to the directory holding it; CLI paths are used as
 * given.
 */
export const resolveConfig = (
  config: BinembedConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  positionalInputs: readonly string[] = [],
  workingDir: string = process.cwd()
): Result<ResolvedConfig, Diagnostic> => {
  const inputs =
    positionalInputs.length > 0
      ? positionalInputs
      : (config.inputs ?? []).map((input) => resolve(projectRoot, input));

  const configuredDir =
    cliOptions.dir ??
    (config.outputDirectory !== undefined
      ? resolve(projectRoot, config.outputDirectory)
      : undefined);

  const namespace = cliOptions.namespace ?? config.namespace;
  if (namespace !== undefined) {
    const checked = validateNamespace(namespace);
    if (!checked.ok) return checked;
  }

  const encoder = validateEncoderOptions({
    style: cliOptions.style ?? config.style ?? DEFAULT_ENCODER_OPTIONS.style,
    lineWidth:
      cliOptions.lineWidth ?? config.lineWidth ?? DEFAULT_ENCODER_OPTIONS.lineWidth,
    rowSize: cliOptions.rowSize ?? config.rowSize ?? DEFAULT_ENCODER_OPTIONS.rowSize,
  });
  if (!encoder.ok) return encoder;

  const outputName = validateOutputName(
    cliOptions.out ?? config.outputName ?? DEFAULT_OUTPUT_NAME
  );
  if (!outputName.ok) return outputName;

  return ok({
    inputs,
    outputDirectory: configuredDir ?? workingDir,
    outputDirectoryGiven: configuredDir !== undefined,
    outputName: outputName.value,
    namespace,
    encoder: encoder.value,
    duplicateNames: cliOptions.onDuplicate ?? config.duplicateNames ?? "overwrite",
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  });
};
