/**
 * Diagnostics reported while loading traces, meta documents and config.
 */

export type Severity = "error" | "warning";

export interface SourceLoc {
  file: string;
  line?: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: Severity;
  loc?: SourceLoc;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  loc?: SourceLoc,
  hint?: string
): Diagnostic {
  const severity: Severity = code.startsWith("E_") ? "error" : "warning";
  return { code, message, severity, loc, hint };
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `${d.severity}[${d.code}]: ${d.message}`;
  if (d.loc) {
    const where = d.loc.line !== undefined ? `${d.loc.file}:${d.loc.line}` : d.loc.file;
    out += `\n  --> ${where}`;
  }
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}

/**
 * Fatal run-level failure. Everything recoverable is a Diagnostic instead.
 */
export class CondtraceError extends Error {
  code: string;
  loc?: SourceLoc;

  constructor(code: string, message: string, loc?: SourceLoc) {
    super(message);
    this.name = "CondtraceError";
    this.code = code;
    this.loc = loc;
  }
}
