/**
 * Console reporting of diagnostics
 */

import { formatDiagnostic, type Diagnostic } from "@binembed/frontend";

export const reportDiagnostic = (diagnostic: Diagnostic): void => {
  const label = diagnostic.severity === "error" ? "Error" : "Warning";
  console.error(`${label}: ${formatDiagnostic(diagnostic)}`);
};

export const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  diagnostics.forEach(reportDiagnostic);
};
