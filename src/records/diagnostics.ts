import type { Diagnostic, DiagnosticStage, SourceFormat, SourceLocation } from './types.js';

export function createDiagnostic(
  format: SourceFormat,
  stage: DiagnosticStage,
  location: SourceLocation,
  reason: string
): Diagnostic {
  return { format, stage, location: { ...location }, reason };
}

/**
 * Renders a diagnostic as a single line, e.g. `scopus-csv row 4: expected 12 columns, found 11`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { format, location, reason } = diagnostic;
  return `${format} ${location.kind} ${location.index}: ${reason}`;
}
