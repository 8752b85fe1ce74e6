/**
 * Diagnostic model
 *
 * Line-level findings produced while reading config text. Diagnostics are
 * collected into lists and returned next to the best-effort model.
 */

import { z } from "zod";

export const DiagnosticSeveritySchema = z.enum(["error", "warning"]);
export type DiagnosticSeverity = z.infer<typeof DiagnosticSeveritySchema>;

export interface Diagnostic {
  /** 1-based line number in the source text */
  readonly line: number;

  /** What is wrong with the line */
  readonly message: string;

  /** The offending line, trimmed */
  readonly text: string;

  readonly severity: DiagnosticSeverity;
}

export function createDiagnostic(
  line: number,
  message: string,
  text: string,
  severity: DiagnosticSeverity = "error",
): Diagnostic {
  return { line, message, text, severity };
}

/**
 * Render a diagnostic as "Line N: message" followed by the indented line text
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `Line ${diagnostic.line}: ${diagnostic.message}\n  ${diagnostic.text}`;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

/**
 * Order diagnostics by line, keeping discovery order within a line
 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort((a, b) => a.diagnostic.line - b.diagnostic.line || a.index - b.index)
    .map(({ diagnostic }) => diagnostic);
}
