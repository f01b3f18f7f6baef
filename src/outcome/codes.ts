import type { Diagnostic, DiagnosticSeverity, DiagnosticSpan } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  C0000: { code: "C0000", severity: "error", category: "Syntax", template: "{message}" },
  C0100: { code: "C0100", severity: "error", category: "Bundle", template: "{message}" },
  C0200: { code: "C0200", severity: "error", category: "Index", template: "{message}" },
  C0300: { code: "C0300", severity: "error", category: "TypeEnv", template: "{message}" },
  C0400: { code: "C0400", severity: "error", category: "Type", template: "{message}" },
  C0500: { code: "C0500", severity: "error", category: "Structure", template: "{message}" },
  C0600: { code: "C0600", severity: "error", category: "Serialize", template: "{message}" },

  C1000: { code: "C1000", severity: "error", category: "Evaluation", template: "{message}" },
  C1001: { code: "C1001", severity: "error", category: "Bundle", template: "Malformed bundle: {message}" },
  C1100: { code: "C1100", severity: "error", category: "Config", template: "Invalid configuration: {message}" },

  W1100: { code: "W1100", severity: "warning", category: "Config", template: "{message}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

/** Code of the diagnostic reported for a failure in elaboration pass `pass`. */
export function passCode(pass: number): DiagnosticCode {
  switch (pass) {
    case 0: return "C0000";
    case 1: return "C0100";
    case 2: return "C0200";
    case 3: return "C0300";
    case 4: return "C0400";
    case 5: return "C0500";
    default: return "C0600";
  }
}

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number | null>,
  span?: DiagnosticSpan
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
    span,
    data: params,
  };
}
