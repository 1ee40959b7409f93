/**
 * Type definitions for CLI
 */

import type { Diagnostic } from "@binembed/frontend";
import type { DuplicateNamePolicy, EncoderOptions, LiteralStyle } from "@binembed/emitter";

/**
 * binembed configuration file (binembed.json)
 */
export type BinembedConfig = {
  readonly $schema?: string;
  readonly inputs?: readonly string[];
  readonly outputDirectory?: string;
  readonly outputName?: string;
  readonly namespace?: string;
  readonly style?: LiteralStyle;
  readonly lineWidth?: number;
  readonly rowSize?: number;
  readonly duplicateNames?: DuplicateNamePolicy;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  dir?: string;
  out?: string;
  namespace?: string;
  style?: LiteralStyle;
  lineWidth?: number;
  rowSize?: number;
  onDuplicate?: DuplicateNamePolicy;
};

/**
 * Resolved configuration (after merging config file and CLI options)
 */
export type ResolvedConfig = {
  readonly inputs: readonly string[];
  readonly outputDirectory: string;
  /** False when the output directory fell back to the working directory */
  readonly outputDirectoryGiven: boolean;
  readonly outputName: string;
  readonly namespace: string | undefined;
  readonly encoder: EncoderOptions;
  readonly duplicateNames: DuplicateNamePolicy;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Why a command failed, and the exit code it maps to
 */
export type CommandFailure = {
  readonly exitCode: number;
  readonly diagnostics: readonly Diagnostic[];
};
