/**
 * Diagnostic types for binembed
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "EMB1001" // Input is neither a regular file nor a directory
  | "EMB1002" // Input file cannot be opened or fully read
  | "EMB1003" // No input files to embed
  | "EMB2001" // Duplicate display name
  | "EMB2002" // Identifier collision (disambiguated)
  | "EMB2003" // Invalid namespace name
  | "EMB2004" // Invalid encoder option or output name
  | "EMB3001" // Output directory or document cannot be created
  | "EMB3002" // Output document cannot be written
  | "EMB4001" // Embedded file not found
  | "EMB4002" // Malformed generated document
  | "EMB9001" // Config file not found
  | "EMB9002"; // Config file invalid

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly path?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  path?: string,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  path,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.path) {
    parts.push(`${diagnostic.path}:`);
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

/**
 * Render an unknown thrown value as a message
 */
export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
