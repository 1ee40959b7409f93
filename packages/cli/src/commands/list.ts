/**
 * binembed list command - show what generate would embed
 */

import { discoverInputFiles, error, ok, type Result } from "@binembed/frontend";
import { assembleRegistry, type RegistryEntry } from "@binembed/emitter";
import { EXIT_CODES } from "../cli/constants.js";
import { reportDiagnostics } from "../cli/report.js";
import type { CommandFailure, ResolvedConfig } from "../types.js";

/**
 * Print one `<identifier>  <displayName>  <path>` line per input file
 */
export const listCommand = (
  config: ResolvedConfig
): Result<readonly RegistryEntry[], CommandFailure> => {
  const discovered = discoverInputFiles(config.inputs);
  if (!discovered.ok) {
    return error({ exitCode: EXIT_CODES.input, diagnostics: [discovered.error] });
  }

  const assembled = assembleRegistry(discovered.value, {
    duplicateNames: config.duplicateNames,
  });
  if (!assembled.ok) {
    return error({ exitCode: EXIT_CODES.input, diagnostics: assembled.error });
  }

  reportDiagnostics(assembled.value.diagnostics);

  const { entries } = assembled.value.registry;
  for (const entry of entries) {
    console.log(`${entry.identifier}  ${entry.displayName}  ${entry.file.path}`);
  }
  return ok(entries);
};
