export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Compiled unit the diagnostic points at, e.g. `core:lib/util.js` */
  unit?: string;
  data?: Record<string, unknown>;
}
