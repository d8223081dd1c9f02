// src/runner/run.ts
//
// Lox Runner
// ----------
// Runs Lox source end-to-end for one `run` invocation:
//
// 1) lexer + parser   -> statements, compile errors reported as they are found
// 2) interpreter      -> executes the statements unless a compile error occurred
//
// It is designed so you can use it from:
// - unit tests (capture stdout/stderr)
// - a CLI or REPL (pass one reporter and reset() it between lines)
//
// Key idea: IO is injected, so the interpreter never touches process streams
// directly when a host is given.
//
// Exports:
//   - runSource(source, options): RunResult
//   - createDefaultNodeIO(): LoxIO
//
// When a reporter is passed in, its own sink receives error lines, so they
// show up in `stderr` only if that sink is this run's io.

import type { Stmt } from "../core/ast";
import { Interpreter } from "../core/interpreter";
import { tokenize } from "../core/lexer";
import { parseTokens } from "../core/parser";
import type { Diagnostic } from "../diagnostics/errors";
import { sortDiagnostics } from "../diagnostics/errors";
import { ErrorReporter, exitCodeFor } from "../diagnostics/reporter";
import type { Logger } from "../utils/logger";

/* =========================================================
   Public types
   ========================================================= */

export type LoxIO = {
  print: (text: string) => void;
  error: (text: string) => void;
};

export type RunOptions = {
  // IO host (if not provided, a default Node host is used)
  io?: LoxIO;

  // Reuse a reporter across runs (REPL). A fresh one is created otherwise.
  reporter?: ErrorReporter;

  logger?: Logger;
};

export type RunResult = {
  ok: boolean;
  /** 0, 65 (compile error) or 70 (runtime error). */
  exitCode: number;

  stdout: string;
  stderr: string;

  diagnostics: Diagnostic[];
  statements: Stmt[];

  timings: {
    analysisMs: number;
    execMs: number;
    totalMs: number;
  };
};

/* =========================================================
   Runner: analyze + execute
   ========================================================= */

export function runSource(source: string, options: RunOptions = {}): RunResult {
  const started = performance.now();

  const stdoutBuf: string[] = [];
  const stderrBuf: string[] = [];

  const base = options.io ?? createDefaultNodeIO();
  const io: LoxIO = {
    print: (text) => {
      stdoutBuf.push(text + "\n");
      base.print(text);
    },
    error: (text) => {
      stderrBuf.push(text + "\n");
      base.error(text);
    },
  };

  const reporter = options.reporter ?? new ErrorReporter({ sink: io.error });
  const log = options.logger;

  // --- ANALYSIS ---
  const analysis = log?.time("analysis");
  const a0 = performance.now();
  const lex = tokenize(source, reporter);
  const { statements } = parseTokens(lex.tokens, reporter);
  const analysisMs = performance.now() - a0;
  analysis?.end({ tokens: lex.tokens.length, statements: statements.length });

  const finish = (execMs: number): RunResult => {
    const exitCode = exitCodeFor(reporter);
    return {
      ok: exitCode === 0,
      exitCode,
      stdout: stdoutBuf.join(""),
      stderr: stderrBuf.join(""),
      diagnostics: sortDiagnostics(reporter.diagnostics),
      statements,
      timings: { analysisMs, execMs, totalMs: performance.now() - started },
    };
  };

  if (reporter.hadError) {
    log?.debug("compile errors; skipping execution");
    return finish(0);
  }

  // --- EXECUTION ---
  const exec = log?.time("execution");
  const e0 = performance.now();
  new Interpreter({ print: io.print }, reporter).interpret(statements);
  const execMs = performance.now() - e0;
  exec?.end();

  return finish(execMs);
}

/* =========================================================
   Default IO
   ========================================================= */

export function createDefaultNodeIO(): LoxIO {
  return {
    print: (text) => {
      process.stdout.write(text + "\n");
    },
    error: (text) => {
      process.stderr.write(text + "\n");
    },
  };
}
