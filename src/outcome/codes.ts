import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  S0001: { code: "S0001", severity: "error", category: "Protection", template: "Write to immutable table: {key}" },
  S0100: { code: "S0100", severity: "error", category: "Loader", template: "Script not found: {path}" },
  S0101: { code: "S0101", severity: "error", category: "Loader", template: "Compile error in {unit}" },
  S0200: { code: "S0200", severity: "error", category: "Runtime", template: "Execution error in {unit}" },
  S0300: { code: "S0300", severity: "error", category: "Validation", template: "Required field missing: {field}" },
  S0301: { code: "S0301", severity: "error", category: "Validation", template: "Invalid argument" },
  S0400: { code: "S0400", severity: "error", category: "Lifecycle", template: "Sandbox used out of order" },
  S0900: { code: "S0900", severity: "error", category: "Internal", template: "Unexpected host error" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  unit?: string
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    unit,
    data: params,
  };
}
