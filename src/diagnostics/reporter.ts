// src/diagnostics/reporter.ts
//
// Error reporter shared by one run of the pipeline. The lexer, parser and
// interpreter push into it; the caller reads the two flags afterwards to pick
// an exit code, and resets it between interactive lines.

import type { Token } from "../core/lexer";
import type { LoxRuntimeError } from "../core/interpreter";
import {
  error as mkError,
  formatCompileError,
  formatRuntimeError,
  fromRuntimeError,
  tokenContext,
  tokenLocation,
  type Diagnostic,
} from "./errors";

export type ReportSink = (line: string) => void;

export type ErrorReporterOptions = {
  /** Receives each formatted report line. Default: stderr. */
  sink?: ReportSink;
};

export const EXIT_OK = 0;
export const EXIT_COMPILE_ERROR = 65;
export const EXIT_RUNTIME_ERROR = 70;

export class ErrorReporter {
  public hadError = false;
  public hadRuntimeError = false;

  private readonly sink: ReportSink;
  private collected: Diagnostic[] = [];

  constructor(options: ErrorReporterOptions = {}) {
    this.sink = options.sink ?? ((line) => process.stderr.write(line + "\n"));
  }

  public get diagnostics(): readonly Diagnostic[] {
    return this.collected;
  }

  /** Bare line-numbered error (lexical errors). */
  public error(line: number, message: string, span: { offset: number; length: number } = { offset: 0, length: 0 }): void {
    this.collected.push(mkError("LEX_ERROR", message, { line, ...span }, "lexer", ""));
    this.sink(formatCompileError(line, "", message));
    this.hadError = true;
  }

  /** Error attributed to a token (parse errors). */
  public errorAt(token: Token, message: string): void {
    const context = tokenContext(token);
    this.collected.push(mkError("PARSE_ERROR", message, tokenLocation(token), "parser", context));
    this.sink(formatCompileError(token.line, context, message));
    this.hadError = true;
  }

  public runtimeError(err: LoxRuntimeError): void {
    this.collected.push(fromRuntimeError(err));
    this.sink(formatRuntimeError(err.message, err.token.line));
    this.hadRuntimeError = true;
  }

  public reset(): void {
    this.hadError = false;
    this.hadRuntimeError = false;
    this.collected = [];
  }
}

export function exitCodeFor(reporter: ErrorReporter): number {
  if (reporter.hadError) return EXIT_COMPILE_ERROR;
  if (reporter.hadRuntimeError) return EXIT_RUNTIME_ERROR;
  return EXIT_OK;
}
