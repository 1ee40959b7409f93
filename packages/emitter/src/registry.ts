/**
 * Registry assembly
 *
 * Orders the input files, makes their identifiers unique and builds the
 * name lookup view the generated `allEmbeddedFiles()` map mirrors.
 */

import {
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
  isDiagnosticError,
  type Diagnostic,
  type InputFile,
  type Result,
  ok,
  error,
} from "@binembed/frontend";
import type {
  AssembledRegistry,
  DuplicateNamePolicy,
  Registry,
  RegistryEntry,
} from "./types.js";

export type RegistryOptions = {
  readonly duplicateNames?: DuplicateNamePolicy;
};

/**
 * Pick an unused identifier by appending the discovery index,
 * then underscores until it is free
 */
const disambiguate = (
  identifier: string,
  index: number,
  taken: ReadonlySet<string>
): string => {
  let candidate = `${identifier}_${index}`;
  while (taken.has(candidate)) {
    candidate += "_";
  }
  return candidate;
};

export const assembleRegistry = (
  files: readonly InputFile[],
  options: RegistryOptions = {}
): Result<AssembledRegistry, readonly Diagnostic[]> => {
  const policy = options.duplicateNames ?? "overwrite";
  let collector = createDiagnosticsCollector();
  const taken = new Set<string>();
  const byName = new Map<string, RegistryEntry>();
  const entries: RegistryEntry[] = [];

  for (const [index, file] of files.entries()) {
    let identifier = file.identifier;
    if (taken.has(identifier)) {
      identifier = disambiguate(file.identifier, index, taken);
      collector = addDiagnostic(
        collector,
        createDiagnostic(
          "EMB2002",
          "warning",
          `Identifier '${file.identifier}' is already used; '${file.displayName}' is emitted as '${identifier}'`,
          file.path
        )
      );
    }
    taken.add(identifier);

    const entry: RegistryEntry = {
      index,
      displayName: file.displayName,
      identifier,
      file,
    };
    entries.push(entry);

    const previous = byName.get(file.displayName);
    if (previous) {
      const duplicate = createDiagnostic(
        "EMB2001",
        policy === "error" ? "error" : "warning",
        policy === "error"
          ? `Duplicate file name '${file.displayName}' (also ${previous.file.path})`
          : `Duplicate file name '${file.displayName}': replaces ${previous.file.path} in allEmbeddedFiles()`,
        file.path,
        policy === "error"
          ? undefined
          : "Rename one of the files, or pass --on-duplicate error to reject duplicates"
      );
      collector = addDiagnostic(collector, duplicate);
    }
    byName.set(file.displayName, entry);
  }

  if (collector.hasErrors) {
    return error(collector.diagnostics.filter(isDiagnosticError));
  }

  const registry: Registry = {
    entries,
    count: entries.length,
    byName,
  };
  return ok({ registry, diagnostics: collector.diagnostics });
};

/**
 * Find the entry that wins for a display name
 */
export const lookupEntry = (
  registry: Registry,
  displayName: string
): Result<RegistryEntry, Diagnostic> => {
  const entry = registry.byName.get(displayName);
  return entry
    ? ok(entry)
    : error(
        createDiagnostic(
          "EMB4001",
          "error",
          `Embedded file not found: ${displayName}`
        )
      );
};
