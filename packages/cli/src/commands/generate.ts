/**
 * binembed generate command - write the declaration and definition documents
 */

import { join } from "node:path";
import {
  createDiagnostic,
  discoverInputFiles,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@binembed/frontend";
import {
  assembleRegistry,
  emitDeclarationDocument,
  emitDefinitionDocument,
  type EmitterOptions,
  type EmittedFile,
} from "@binembed/emitter";
import { EXIT_CODES } from "../cli/constants.js";
import { reportDiagnostic, reportDiagnostics } from "../cli/report.js";
import { ensureOutputDirectory, removeOutputs, writeDocument } from "../output.js";
import type { CommandFailure, ResolvedConfig } from "../types.js";

export type GenerateSummary = {
  readonly headerPath: string;
  readonly sourcePath: string;
  readonly files: readonly EmittedFile[];
};

const failure = (
  exitCode: number,
  diagnostics: readonly Diagnostic[]
): Result<GenerateSummary, CommandFailure> => error({ exitCode, diagnostics });

/**
 * Generate <name>.h and <name>.cpp. Nothing is left on disk when a step fails.
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<GenerateSummary, CommandFailure> => {
  const { quiet, verbose, outputDirectory } = config;

  const discovered = discoverInputFiles(config.inputs);
  if (!discovered.ok) {
    return failure(EXIT_CODES.input, [discovered.error]);
  }

  const assembled = assembleRegistry(discovered.value, {
    duplicateNames: config.duplicateNames,
  });
  if (!assembled.ok) {
    return failure(EXIT_CODES.input, assembled.error);
  }
  const { registry, diagnostics } = assembled.value;
  reportDiagnostics(diagnostics);

  if (registry.count === 0) {
    reportDiagnostic(
      createDiagnostic(
        "EMB1003",
        "warning",
        "No input files; generating an empty registry"
      )
    );
  }

  const created = ensureOutputDirectory(outputDirectory);
  if (!created.ok) {
    return failure(EXIT_CODES.generation, [created.error]);
  }
  if (!quiet) {
    if (!config.outputDirectoryGiven) {
      console.log(`Using ${outputDirectory} as output dir`);
    } else if (created.value) {
      console.log(`Creating output dir ${outputDirectory}`);
    }
    console.log(`Ready to process ${registry.count} file(s).`);
  }

  const headerFileName = `${config.outputName}.h`;
  const headerPath = join(outputDirectory, headerFileName);
  const sourcePath = join(outputDirectory, `${config.outputName}.cpp`);
  const options: EmitterOptions = {
    namespace: config.namespace,
    headerFileName,
    encoder: config.encoder,
  };

  const abort = (diagnostic: Diagnostic): Result<GenerateSummary, CommandFailure> =>
    failure(EXIT_CODES.generation, [
      diagnostic,
      ...removeOutputs([headerPath, sourcePath]),
    ]);

  if (!quiet) {
    console.log(`Generating ${headerPath}...`);
  }
  const header = writeDocument(headerPath, (sink) => {
    const text = emitDeclarationDocument(registry, options);
    if (text.ok) {
      sink.write(text.value);
    }
    return text;
  });
  if (!header.ok) {
    return abort(header.error);
  }

  if (!quiet) {
    console.log(`Generating ${sourcePath}...`);
  }
  const source = writeDocument(sourcePath, (sink) =>
    emitDefinitionDocument(registry, options, sink, {
      onFileStart: (entry) => {
        if (!quiet) {
          console.log(
            verbose ? `  ${entry.displayName} (${entry.file.path})` : `  ${entry.displayName}`
          );
        }
      },
      onFileDone: (file) => {
        if (verbose && !quiet) {
          console.log(`    ${file.identifier}: ${file.size} byte(s)`);
        }
      },
    })
  );
  if (!source.ok) {
    return abort(source.error);
  }

  if (!quiet) {
    console.log(`✓ Embedded ${source.value.length} file(s)`);
  }

  return ok({ headerPath, sourcePath, files: source.value });
};
