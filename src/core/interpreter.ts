// src/core/interpreter.ts
//
// Lox Interpreter (tree-walking evaluator)
// ----------------------------------------
// Executes a parsed statement list (see src/core/ast.ts).
//
// Runtime model:
// - Values: number (IEEE double) | string | boolean | null
// - Truthiness: null and false are falsey, everything else is truthy
// - Equality: same type and same value, never coerces
// - Arithmetic and comparison operators require numbers; `+` also concatenates
//   two strings
//
// Notes:
// - Evaluation is synchronous; statements run strictly one after another.
// - Runtime failures are returned as Err values, never thrown. interpret() is
//   the one place that checks for them: the first is reported and the rest of
//   the program is skipped.
// - Output goes through HostServices.print so tests and the language server can
//   capture it.

import type { Expr, Stmt } from "./ast";
import { assertNeverNode } from "./ast";
import { TokenKind, type Token } from "./lexer";
import { andThen, err, isErr, map, ok, type Result } from "./result";
import type { ErrorReporter } from "../diagnostics/reporter";

/* =========================================================
   Runtime Types
   ========================================================= */

export type RuntimeValue = number | string | boolean | null;

/* =========================================================
   Errors
   ========================================================= */

export const NUMBER_OPERANDS_MESSAGE = "Operand(s) must be numbers.";
export const PLUS_OPERANDS_MESSAGE = "Operands must be two numbers or two strings.";

export class LoxRuntimeError {
  /** Operator or identifier token the failure is attributed to. */
  public readonly token: Token;
  public readonly message: string;

  constructor(token: Token, message: string) {
    this.token = token;
    this.message = message;
  }
}

type Evaluated<T> = Result<T, LoxRuntimeError>;

/* =========================================================
   Host Services (pluggable I/O)
   ========================================================= */

export type HostServices = {
  /** Print one line of program output. */
  print: (line: string) => void;
};

export function defaultHostServices(): HostServices {
  return {
    print: (line) => {
      process.stdout.write(line + "\n");
    },
  };
}

/* =========================================================
   Helpers: truthiness / equality / display
   ========================================================= */

export function isTruthy(v: RuntimeValue): boolean {
  if (v === null) return false;
  if (typeof v === "boolean") return v;
  return true;
}

export function isEqual(a: RuntimeValue, b: RuntimeValue): boolean {
  // NaN is not equal to itself, matching IEEE comparison
  return a === b;
}

export function stringify(v: RuntimeValue): string {
  if (v === null) return "nil";
  if (typeof v === "number") {
    if (Object.is(v, -0)) return "-0";
    // integral values print every digit, never exponent form (1e21 -> 1000000000000000000000)
    if (Number.isInteger(v)) return BigInt(v).toString();
    return String(v);
  }
  if (typeof v === "string") return JSON.stringify(v);
  return v ? "true" : "false";
}

/* =========================================================
   Interpreter
   ========================================================= */

export class Interpreter {
  private readonly host: HostServices;
  private readonly reporter: ErrorReporter | null;

  constructor(host?: Partial<HostServices>, reporter?: ErrorReporter) {
    this.host = { ...defaultHostServices(), ...(host ?? {}) };
    this.reporter = reporter ?? null;
  }

  /**
   * Runs every statement in order. Returns the runtime error that stopped the
   * program (already reported), or null when all statements completed.
   */
  public interpret(statements: readonly Stmt[]): LoxRuntimeError | null {
    for (const st of statements) {
      const res = this.execute(st);
      if (isErr(res)) {
        this.reporter?.runtimeError(res.e);
        return res.e;
      }
    }
    return null;
  }

  /* =========================================================
     Statements
     ========================================================= */

  public execute(st: Stmt): Evaluated<void> {
    switch (st.kind) {
      case "ExpressionStatement":
        return map(this.evaluate(st.expression), () => undefined);

      case "PrintStatement":
        return map(this.evaluate(st.expression), (value) => {
          this.host.print(stringify(value));
        });

      case "VarDeclaration":
        // no storage yet: the initializer runs for its effects only
        if (st.initializer) return map(this.evaluate(st.initializer), () => undefined);
        return ok(undefined);

      default:
        return assertNeverNode(st);
    }
  }

  /* =========================================================
     Expressions
     ========================================================= */

  public evaluate(expr: Expr): Evaluated<RuntimeValue> {
    switch (expr.kind) {
      case "Literal":
        return ok(expr.value);

      case "Grouping":
        return this.evaluate(expr.expression);

      case "Unary":
        return andThen(this.evaluate(expr.right), (right) => applyUnary(expr.operator, right));

      case "Binary": {
        const left = this.evaluate(expr.left);
        if (isErr(left)) return left;
        return andThen(this.evaluate(expr.right), (right) => applyBinary(expr.operator, left.v, right));
      }

      case "Variable":
        return err(new LoxRuntimeError(expr.name, `Undefined variable '${expr.name.lexeme}'.`));

      default:
        return assertNeverNode(expr);
    }
  }
}

/* =========================================================
   Operators
   ========================================================= */

function applyUnary(op: Token, right: RuntimeValue): Evaluated<RuntimeValue> {
  switch (op.kind) {
    case TokenKind.MINUS:
      if (typeof right !== "number") return err(new LoxRuntimeError(op, NUMBER_OPERANDS_MESSAGE));
      return ok(-right);
    case TokenKind.BANG:
      return ok(!isTruthy(right));
    default:
      return err(new LoxRuntimeError(op, `Unsupported unary operator '${op.lexeme}'.`));
  }
}

function applyBinary(op: Token, left: RuntimeValue, right: RuntimeValue): Evaluated<RuntimeValue> {
  switch (op.kind) {
    // equality
    case TokenKind.EQUAL_EQUAL:
      return ok(isEqual(left, right));
    case TokenKind.BANG_EQUAL:
      return ok(!isEqual(left, right));

    case TokenKind.PLUS:
      if (typeof left === "number" && typeof right === "number") return ok(left + right);
      if (typeof left === "string" && typeof right === "string") return ok(left + right);
      return err(new LoxRuntimeError(op, PLUS_OPERANDS_MESSAGE));

    default:
      break;
  }

  if (typeof left !== "number" || typeof right !== "number") {
    return err(new LoxRuntimeError(op, NUMBER_OPERANDS_MESSAGE));
  }

  switch (op.kind) {
    // comparison
    case TokenKind.GREATER:
      return ok(left > right);
    case TokenKind.GREATER_EQUAL:
      return ok(left >= right);
    case TokenKind.LESS:
      return ok(left < right);
    case TokenKind.LESS_EQUAL:
      return ok(left <= right);

    // arithmetic
    case TokenKind.MINUS:
      return ok(left - right);
    case TokenKind.STAR:
      return ok(left * right);
    case TokenKind.SLASH:
      // IEEE semantics: x / 0 is +-Infinity, 0 / 0 is NaN
      return ok(left / right);

    default:
      return err(new LoxRuntimeError(op, `Unsupported binary operator '${op.lexeme}'.`));
  }
}
