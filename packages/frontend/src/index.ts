/**
 * binembed frontend - input model, identifiers and discovery
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  describeError,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export {
  IDENTIFIER_PREFIX,
  deriveIdentifier,
  isValidIdentifier,
  isCppKeyword,
  validateNamespace,
  makeGuardToken,
} from "./identifiers.js";

export {
  type ByteSource,
  type InputFile,
  createInputFile,
  memoryByteSource,
  readAll,
} from "./input-file.js";

export { DEFAULT_CHUNK_SIZE, fileByteSource } from "./file-source.js";
export { discoverPaths, discoverInputFiles } from "./discovery.js";
