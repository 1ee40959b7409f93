/**
 * Input discovery
 *
 * Turns the paths given on the command line into an ordered list of input
 * files. Directories are walked recursively in name order so the same tree
 * always yields the same list.
 */

import { readdirSync, statSync, type Dirent } from "node:fs";
import { join } from "node:path";
import {
  createDiagnostic,
  describeError,
  type Diagnostic,
} from "./types/diagnostic.js";
import { type Result, ok, error, map } from "./types/result.js";
import { createInputFile, type InputFile } from "./input-file.js";
import { fileByteSource } from "./file-source.js";

type PathKind = "file" | "directory" | "other" | "missing";

const statKind = (path: string): Result<PathKind, Diagnostic> => {
  try {
    const stats = statSync(path, { throwIfNoEntry: false });
    if (!stats) return ok("missing");
    if (stats.isFile()) return ok("file");
    if (stats.isDirectory()) return ok("directory");
    return ok("other");
  } catch (err) {
    return error(
      createDiagnostic(
        "EMB1001",
        "error",
        `Can't access '${path}': ${describeError(err)}`,
        path
      )
    );
  }
};

const byName = (a: Dirent, b: Dirent): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

const readEntries = (dir: string): Result<readonly Dirent[], Diagnostic> => {
  try {
    return ok(readdirSync(dir, { withFileTypes: true }).sort(byName));
  } catch (err) {
    return error(
      createDiagnostic(
        "EMB1001",
        "error",
        `Failed to read directory: ${describeError(err)}`,
        dir
      )
    );
  }
};

/**
 * Collect regular files below a directory.
 * Symlinks to files are kept; symlinks to directories are not followed.
 */
const walkDirectory = (dir: string): Result<readonly string[], Diagnostic> => {
  const entries = readEntries(dir);
  if (!entries.ok) return entries;

  const found: string[] = [];
  for (const entry of entries.value) {
    const entryPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      const nested = walkDirectory(entryPath);
      if (!nested.ok) return nested;
      found.push(...nested.value);
    } else if (entry.isFile()) {
      found.push(entryPath);
    } else if (entry.isSymbolicLink()) {
      const kind = statKind(entryPath);
      if (!kind.ok) return kind;
      if (kind.value === "file") found.push(entryPath);
    }
  }
  return ok(found);
};

/**
 * Expand inputs into file paths, in the order given
 */
export const discoverPaths = (
  inputs: readonly string[]
): Result<readonly string[], Diagnostic> => {
  const found: string[] = [];

  for (const input of inputs) {
    const kind = statKind(input);
    if (!kind.ok) return kind;

    if (kind.value === "file") {
      found.push(input);
    } else if (kind.value === "directory") {
      const walked = walkDirectory(input);
      if (!walked.ok) return walked;
      found.push(...walked.value);
    } else {
      return error(
        createDiagnostic(
          "EMB1001",
          "error",
          `Can't find file or directory '${input}'`,
          input
        )
      );
    }
  }

  return ok(found);
};

/**
 * Discover input files and derive their identifiers
 */
export const discoverInputFiles = (
  inputs: readonly string[]
): Result<readonly InputFile[], Diagnostic> =>
  map(discoverPaths(inputs), (paths) =>
    paths.map((path) => createInputFile(path, fileByteSource(path)))
  );
