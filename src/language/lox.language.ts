// src/language/lox.language.ts
//
// Lox Language Service (high-level)
// ---------------------------------
// Single "do everything" entrypoint for editor features. It coordinates:
// - Lexer
// - Parser
// - Lint
//
// Execution is not part of this layer; see src/runner/run.ts.
//
// Exports:
//   - analyzeText(source, options): LoxLanguageResult
//   - LoxLanguageOptions / LoxLanguageResult types

import type { Stmt } from "../core/ast";
import { tokenize, type LexResult } from "../core/lexer";
import { parseTokens, type ParseResult } from "../core/parser";
import type { Diagnostic } from "../diagnostics/errors";
import { dedupeDiagnostics, fromLexerErrors, fromParserErrors, mergeDiagnostics } from "../diagnostics/errors";
import { lintProgram, type LintContext } from "../diagnostics/lint";

/* =========================================================
   Public types
   ========================================================= */

export type LoxLanguageOptions = {
  lint?: {
    enabled?: boolean;
    predeclared?: LintContext["predeclared"];
  };
};

export type LoxLanguageStageTimings = {
  lexMs: number;
  parseMs: number;
  lintMs: number;
  totalMs: number;
};

export type LoxLanguageResult = {
  /** No error-severity diagnostics. */
  ok: boolean;

  tokens: LexResult["tokens"];
  statements: Stmt[];

  diagnostics: Diagnostic[];

  timings: LoxLanguageStageTimings;
};

/* =========================================================
   Main entrypoint
   ========================================================= */

export function analyzeText(source: string, options: LoxLanguageOptions = {}): LoxLanguageResult {
  const started = performance.now();

  // -------- LEX --------
  const t0 = performance.now();
  const lex = tokenize(source);
  const lexMs = performance.now() - t0;

  // -------- PARSE --------
  const t1 = performance.now();
  const parse: ParseResult = parseTokens(lex.tokens);
  const parseMs = performance.now() - t1;

  // -------- LINT --------
  const t2 = performance.now();
  const lintDiags =
    options.lint?.enabled ?? true
      ? lintProgram(parse.statements, { predeclared: options.lint?.predeclared })
      : [];
  const lintMs = performance.now() - t2;

  // -------- DIAGNOSTICS MERGE --------
  const diagnostics = dedupeDiagnostics(
    mergeDiagnostics(fromLexerErrors(lex.errors), fromParserErrors(parse.errors), lintDiags)
  );

  return {
    ok: diagnostics.every((d) => d.severity !== "error"),
    tokens: lex.tokens,
    statements: parse.statements,
    diagnostics,
    timings: { lexMs, parseMs, lintMs, totalMs: performance.now() - started },
  };
}
