// src/diagnostics/errors.ts
//
// Lox diagnostics model + helpers
// -------------------------------
// One shared format for:
// - Lexer errors
// - Parser errors
// - Runtime errors
// - Lint warnings
//
// The reporter, the language service and the language server all speak this
// model; only the LSP layer converts it to protocol types.
//
// Design goals:
// - Stable rule codes (so you can filter/suppress later)
// - Offset-based locations (map cleanly onto editor positions)
// - Convenience factories + merging + sorting

import { TokenKind, type LexerError, type Token } from "../core/lexer";

export type Severity = "error" | "warning" | "info";

export type DiagnosticSource = "lexer" | "parser" | "runtime" | "lint";

export type Location = {
  line: number; // 1-based
  offset: number; // absolute offset in source (0..len)
  length: number;
};

export type Diagnostic = {
  severity: Severity;
  code: string; // stable ID, e.g. "LEX_ERROR"
  message: string;
  location: Location;

  source?: DiagnosticSource;
  /** "", " at end" or " at 'lexeme'"; only compile errors carry one. */
  context?: string;
};

/* =========================================================
   Factories
   ========================================================= */

export function diag(
  severity: Severity,
  code: string,
  message: string,
  location: Location,
  source?: DiagnosticSource,
  context?: string
): Diagnostic {
  return { severity, code, message, location, source, context };
}

export function error(code: string, message: string, location: Location, source?: DiagnosticSource, context?: string): Diagnostic {
  return diag("error", code, message, location, source, context);
}

export function warn(code: string, message: string, location: Location, source?: DiagnosticSource): Diagnostic {
  return diag("warning", code, message, location, source);
}

export function tokenLocation(token: Token): Location {
  return { line: token.line, offset: token.offset, length: token.lexeme.length };
}

/** Where-clause of a compile error attributed to a token. */
export function tokenContext(token: Token): string {
  return token.kind === TokenKind.EOF ? " at end" : ` at '${token.lexeme}'`;
}

/* =========================================================
   Merging & sorting
   ========================================================= */

export function mergeDiagnostics(...lists: Array<readonly Diagnostic[] | undefined | null>): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const l of lists) {
    if (!l) continue;
    out.push(...l);
  }
  return sortDiagnostics(out);
}

export function sortDiagnostics(list: readonly Diagnostic[]): Diagnostic[] {
  return [...list].sort((a, b) => {
    const ao = a.location.offset;
    const bo = b.location.offset;
    if (ao !== bo) return ao - bo;

    // severity ordering: error > warning > info
    const sa = severityRank(a.severity);
    const sb = severityRank(b.severity);
    if (sa !== sb) return sb - sa;

    return a.code.localeCompare(b.code);
  });
}

function severityRank(s: Severity): number {
  switch (s) {
    case "error":
      return 3;
    case "warning":
      return 2;
    case "info":
      return 1;
  }
}

/* =========================================================
   De-duplication
   ========================================================= */

export function dedupeDiagnostics(list: readonly Diagnostic[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];

  for (const d of sortDiagnostics(list)) {
    const key = `${d.code}|${d.severity}|${d.location.offset}|${d.location.length}|${d.message}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(d);
  }

  return out;
}

/* =========================================================
   Converters
   ========================================================= */

export type TokenError = { token: Token; message: string };

export function fromLexerErrors(errors: readonly LexerError[]): Diagnostic[] {
  return errors.map((e) =>
    error("LEX_ERROR", e.message, { line: e.line, offset: e.offset, length: e.length }, "lexer", "")
  );
}

export function fromParserErrors(errors: readonly TokenError[]): Diagnostic[] {
  return errors.map((e) => error("PARSE_ERROR", e.message, tokenLocation(e.token), "parser", tokenContext(e.token)));
}

export function fromRuntimeError(e: TokenError): Diagnostic {
  return error("RUNTIME_ERROR", e.message, tokenLocation(e.token), "runtime");
}

/* =========================================================
   Formatting
   ========================================================= */

/** `[line N] Error<context>: <message>` */
export function formatCompileError(line: number, context: string, message: string): string {
  return `[line ${line}] Error${context}: ${message}`;
}

/** `<message> [line N]` */
export function formatRuntimeError(message: string, line: number): string {
  return `${message} [line ${line}]`;
}

export function formatDiagnostic(d: Diagnostic): string {
  if (d.source === "runtime") return formatRuntimeError(d.message, d.location.line);
  if (d.severity === "error") return formatCompileError(d.location.line, d.context ?? "", d.message);

  const label = d.severity === "warning" ? "Warning" : "Info";
  return `[line ${d.location.line}] ${label} ${d.code}: ${d.message}`;
}

export function formatDiagnostics(list: readonly Diagnostic[]): string {
  return sortDiagnostics(list).map(formatDiagnostic).join("\n");
}
