// src/diagnostics/lint.ts
//
// Lox Lint Rules
// --------------
// Static, conservative checks over a parsed program. Output is the shared
// Diagnostic model (src/diagnostics/errors.ts) at warning severity.
//
// Rules:
//   LINT_UNDECLARED         variable read with no earlier `var` of that name
//   LINT_UNBOUND_READ       read of a declared name; variables have no storage
//                           yet, so every read fails at runtime
//   LINT_REDECLARED         the same name declared twice
//
// Export:
//   - lintProgram(statements, ctx?): Diagnostic[]

import type { Expr, Stmt } from "../core/ast";
import { walkAst } from "../core/ast";
import type { Token } from "../core/lexer";
import { tokenLocation, warn, type Diagnostic } from "./errors";

/* =========================================================
   Lint context
   ========================================================= */

export type LintContext = {
  /** Names treated as already declared (e.g. from earlier REPL lines). */
  predeclared?: readonly string[];
};

export function lintProgram(statements: readonly Stmt[], ctx: LintContext = {}): Diagnostic[] {
  const linter = new Linter(ctx);
  for (const st of statements) linter.visitStatement(st);
  return linter.diagnostics;
}

/* =========================================================
   Linter implementation
   ========================================================= */

class Linter {
  public readonly diagnostics: Diagnostic[] = [];
  private readonly declared = new Set<string>();

  constructor(ctx: LintContext) {
    for (const name of ctx.predeclared ?? []) this.declared.add(name);
  }

  public visitStatement(st: Stmt): void {
    switch (st.kind) {
      case "VarDeclaration":
        // initializer is checked before the name comes into scope
        if (st.initializer) this.visitExpression(st.initializer);
        this.declare(st.name);
        return;

      case "ExpressionStatement":
      case "PrintStatement":
        this.visitExpression(st.expression);
        return;
    }
  }

  private visitExpression(expr: Expr): void {
    walkAst(expr, {
      Variable: (node) => {
        const name = node.name.lexeme;
        const at = tokenLocation(node.name);
        this.diagnostics.push(
          this.declared.has(name)
            ? warn("LINT_UNBOUND_READ", `Variable '${name}' has no storage; reading it fails at runtime.`, at, "lint")
            : warn("LINT_UNDECLARED", `Variable '${name}' is not declared.`, at, "lint")
        );
      },
    });
  }

  private declare(name: Token): void {
    if (this.declared.has(name.lexeme)) {
      this.diagnostics.push(
        warn("LINT_REDECLARED", `Variable '${name.lexeme}' is already declared.`, tokenLocation(name), "lint")
      );
      return;
    }
    this.declared.add(name.lexeme);
  }
}
