/**
 * Output documents on disk
 */

import { closeSync, existsSync, mkdirSync, openSync, rmSync, writeSync } from "node:fs";
import {
  createDiagnostic,
  describeError,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@binembed/frontend";
import type { TextSink } from "@binembed/emitter";

/**
 * Create the output directory when it is missing.
 * Returns true when it had to be created.
 */
export const ensureOutputDirectory = (
  dir: string
): Result<boolean, Diagnostic> => {
  if (existsSync(dir)) {
    return ok(false);
  }
  try {
    mkdirSync(dir, { recursive: true });
    return ok(true);
  } catch (err) {
    return error(
      createDiagnostic(
        "EMB3001",
        "error",
        `Failed to create output directory: ${describeError(err)}`,
        dir
      )
    );
  }
};

/**
 * Open a document for writing, hand a sink over it to `emit`, and close it
 * whatever happens. Write errors become EMB3002.
 */
export const writeDocument = <T>(
  path: string,
  emit: (sink: TextSink) => Result<T, Diagnostic>
): Result<T, Diagnostic> => {
  let fd: number;
  try {
    fd = openSync(path, "w");
  } catch (err) {
    return error(
      createDiagnostic(
        "EMB3001",
        "error",
        `Failed to create output file: ${describeError(err)}`,
        path
      )
    );
  }

  try {
    return emit({
      write: (text) => {
        writeSync(fd, text);
      },
    });
  } catch (err) {
    return error(
      createDiagnostic(
        "EMB3002",
        "error",
        `Failed to write output file: ${describeError(err)}`,
        path
      )
    );
  } finally {
    closeSync(fd);
  }
};

/**
 * Delete documents left behind by a failed run.
 * Returns a warning for each one that could not be removed.
 */
export const removeOutputs = (paths: readonly string[]): readonly Diagnostic[] =>
  paths.flatMap((path) => {
    try {
      rmSync(path, { force: true });
      return [];
    } catch (err) {
      return [
        createDiagnostic(
          "EMB3002",
          "warning",
          `Failed to remove partial output: ${describeError(err)}`,
          path
        ),
      ];
    }
  });
