import { describe, expect, it } from "vitest";
import { literal, printStmt } from "../../src/core/ast";
import {
  Interpreter,
  LoxRuntimeError,
  NUMBER_OPERANDS_MESSAGE,
  PLUS_OPERANDS_MESSAGE,
  isEqual,
  isTruthy,
  stringify,
  type RuntimeValue,
} from "../../src/core/interpreter";
import { parseSource } from "../../src/core/parser";
import type { Result } from "../../src/core/result";
import { ErrorReporter } from "../../src/diagnostics/reporter";

function evalExpr(source: string): Result<RuntimeValue, LoxRuntimeError> {
  const { statements, errors } = parseSource(`${source};`);
  expect(errors).toEqual([]);
  const st = statements[0];
  if (st.kind !== "ExpressionStatement") throw new Error(`expected an expression statement, got ${st.kind}`);
  return new Interpreter({ print: () => undefined }).evaluate(st.expression);
}

function value(source: string): RuntimeValue {
  const res = evalExpr(source);
  if (res.t === "err") throw new Error(`unexpected runtime error: ${res.e.message}`);
  return res.v;
}

function failure(source: string): LoxRuntimeError {
  const res = evalExpr(source);
  if (res.t === "ok") throw new Error(`expected a runtime error, got ${String(res.v)}`);
  return res.e;
}

function run(source: string) {
  const printed: string[] = [];
  const reported: string[] = [];
  const reporter = new ErrorReporter({ sink: (line) => reported.push(line) });
  const interpreter = new Interpreter({ print: (line) => printed.push(line) }, reporter);

  const error = interpreter.interpret(parseSource(source).statements);
  return { printed, reported, reporter, error };
}

describe("truthiness", () => {
  it("treats nil and false as falsey", () => {
    expect(value("!nil")).toBe(true);
    expect(value("!false")).toBe(true);
  });

  it("treats zero and empty text as truthy", () => {
    expect(value("!0")).toBe(false);
    expect(value('!""')).toBe(false);
  });

  it("exposes the rule directly", () => {
    expect([null, false, true, 0, ""].map(isTruthy)).toEqual([false, false, true, true, true]);
  });
});

describe("stringify", () => {
  it("renders numbers without a trailing fraction when integral", () => {
    expect(stringify(3.0)).toBe("3");
    expect(stringify(3.5)).toBe("3.5");
    expect(stringify(-0)).toBe("-0");
    expect(stringify(1 / 0)).toBe("Infinity");
  });

  it("prints large integral values in full", () => {
    expect(stringify(1e21)).toBe("1000000000000000000000");
    expect(stringify(-(2 ** 60))).toBe("-1152921504606846976");
    expect(stringify(1e-7)).toBe("1e-7");
  });

  it("renders nil, booleans and quoted text", () => {
    expect(stringify(null)).toBe("nil");
    expect(stringify(true)).toBe("true");
    expect(stringify("hi")).toBe('"hi"');
  });
});

describe("operators", () => {
  it("evaluates arithmetic with precedence and grouping", () => {
    expect(value("2 * (3 + 4)")).toBe(14);
    expect(value("10 - 4 - 3")).toBe(3);
    expect(value("7 / 2")).toBe(3.5);
    expect(value("-(2 + 1)")).toBe(-3);
  });

  it("concatenates two strings with +", () => {
    expect(value('"foo" + "bar"')).toBe("foobar");
  });

  it("compares numbers", () => {
    expect([value("1 < 2"), value("2 <= 2"), value("1 > 2"), value("3 >= 4")]).toEqual([true, true, false, false]);
  });

  it("never coerces in equality", () => {
    expect(value('1 == "1"')).toBe(false);
    expect(value("nil == false")).toBe(false);
    expect(value("nil == nil")).toBe(true);
    expect(value('"a" != "a"')).toBe(false);
    expect(isEqual(0, -0)).toBe(true);
  });

  it("follows IEEE semantics for division by zero", () => {
    expect(value("1 / 0")).toBe(Infinity);
    expect(value("-1 / 0")).toBe(-Infinity);
    expect(Number.isNaN(value("0 / 0"))).toBe(true);
  });
});

describe("runtime errors", () => {
  it("rejects unary minus on text, tagged with the operator line", () => {
    const e = failure('\n-"a"');

    expect(e).toBeInstanceOf(LoxRuntimeError);
    expect(e.message).toBe(NUMBER_OPERANDS_MESSAGE);
    expect(e.message).toBe("Operand(s) must be numbers.");
    expect(e.token.lexeme).toBe("-");
    expect(e.token.line).toBe(2);
  });

  it("requires numbers for arithmetic and comparison", () => {
    expect(failure('"a" * 2').token.lexeme).toBe("*");
    expect(failure('"a" < "b"').message).toBe(NUMBER_OPERANDS_MESSAGE);
    expect(failure("true - 1").message).toBe(NUMBER_OPERANDS_MESSAGE);
  });

  it("rejects + on mismatched operands", () => {
    const e = failure('1 + "a"');
    expect(e.message).toBe(PLUS_OPERANDS_MESSAGE);
    expect(e.token.lexeme).toBe("+");
  });

  it("fails on a variable reference", () => {
    expect(failure("answer").message).toBe("Undefined variable 'answer'.");
  });

  it("stops at the first failing operand", () => {
    expect(failure('-"x" + undefinedName').message).toBe(NUMBER_OPERANDS_MESSAGE);
  });
});

describe("interpret", () => {
  it("prints each value on its own line", () => {
    const { printed, error } = run('print 1; print "a"; print nil; print 2 > 1;');

    expect(error).toBeNull();
    expect(printed).toEqual(["1", '"a"', "nil", "true"]);
  });

  it("evaluates initializers and discards expression results", () => {
    const { printed, reporter } = run("var a = 1 + 2; 3 * 4; var b; print 5;");

    expect(printed).toEqual(["5"]);
    expect(reporter.hadRuntimeError).toBe(false);
  });

  it("reports the first runtime error and halts", () => {
    const { printed, reported, reporter, error } = run('print 1;\nprint -"x";\nprint 2;');

    expect(printed).toEqual(["1"]);
    expect(reported).toEqual(["Operand(s) must be numbers. [line 2]"]);
    expect(reporter.hadRuntimeError).toBe(true);
    expect(error?.token.line).toBe(2);
  });

  it("reports failures in a declaration initializer", () => {
    const { reported } = run("var a = -nil;");
    expect(reported).toEqual(["Operand(s) must be numbers. [line 1]"]);
  });

  it("executes single statements directly", () => {
    const printed: string[] = [];
    const interpreter = new Interpreter({ print: (line) => printed.push(line) });

    const res = interpreter.execute(printStmt(literal(42)));

    expect(res).toEqual({ t: "ok", v: undefined });
    expect(printed).toEqual(["42"]);
  });
});
