/**
 * binembed inspect command - read a generated definition document back
 */

import { readFileSync } from "node:fs";
import {
  createDiagnostic,
  describeError,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@binembed/frontend";
import {
  mustGetFile,
  readDefinitionDocument,
  type EmbeddedFileTable,
} from "@binembed/emitter";
import { EXIT_CODES } from "../cli/constants.js";
import type { CommandFailure } from "../types.js";

export type InspectOptions = {
  readonly verbose: boolean;
};

const failed = (diagnostic: Diagnostic): Result<EmbeddedFileTable, CommandFailure> =>
  error({ exitCode: EXIT_CODES.inspect, diagnostics: [diagnostic] });

/**
 * Print the files a definition document embeds, or the size of one of them
 */
export const inspectCommand = (
  documentPath: string,
  name: string | undefined,
  options: InspectOptions
): Result<EmbeddedFileTable, CommandFailure> => {
  let text: string;
  try {
    text = readFileSync(documentPath, "utf-8");
  } catch (err) {
    return failed(
      createDiagnostic(
        "EMB1002",
        "error",
        `Failed to read file: ${describeError(err)}`,
        documentPath
      )
    );
  }

  const table = readDefinitionDocument(text);
  if (!table.ok) {
    return failed({ ...table.error, path: documentPath });
  }

  if (name !== undefined) {
    const content = mustGetFile(table.value, name);
    if (!content.ok) {
      return failed({ ...content.error, path: documentPath });
    }
    console.log(`${name}: ${content.value.length} byte(s)`);
    return ok(table.value);
  }

  console.log(`${table.value.count} embedded file(s)`);
  for (const file of table.value.files) {
    console.log(
      options.verbose
        ? `  ${file.name}  ${file.size} byte(s)  ${file.identifier}`
        : `  ${file.name}  ${file.size} byte(s)`
    );
  }
  return ok(table.value);
};
