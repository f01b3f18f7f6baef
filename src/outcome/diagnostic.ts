export type DiagnosticSeverity = "error" | "warning" | "info";

export interface DiagnosticSpan {
  file: string;
  line: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: DiagnosticSpan;
  data?: Record<string, string | number | null>;
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.span ? `${d.span.file}:${d.span.line}: ` : "";
  return `${where}${d.severity}[${d.code}]: ${d.message}`;
}
