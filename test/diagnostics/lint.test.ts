import { describe, expect, it } from "vitest";
import { parseSource } from "../../src/core/parser";
import { lintProgram } from "../../src/diagnostics/lint";

const lint = (source: string, predeclared?: string[]) => lintProgram(parseSource(source).statements, { predeclared });

describe("lintProgram", () => {
  it("flags a reference with no earlier declaration", () => {
    expect(lint("print x;")).toEqual([
      {
        severity: "warning",
        code: "LINT_UNDECLARED",
        message: "Variable 'x' is not declared.",
        location: { line: 1, offset: 6, length: 1 },
        source: "lint",
      },
    ]);
  });

  it("flags a read of a declared variable, which fails at runtime", () => {
    expect(lint("var a = 1;\nprint a;")).toEqual([
      {
        severity: "warning",
        code: "LINT_UNBOUND_READ",
        message: "Variable 'a' has no storage; reading it fails at runtime.",
        location: { line: 2, offset: 17, length: 1 },
        source: "lint",
      },
    ]);
  });

  it("flags every read after a declaration", () => {
    expect(lint("var a; print a; a + 1;").map((d) => [d.code, d.location.offset])).toEqual([
      ["LINT_UNBOUND_READ", 13],
      ["LINT_UNBOUND_READ", 16],
    ]);
  });

  it("checks the initializer before the name is declared", () => {
    expect(lint("var a = a;").map((d) => [d.code, d.location.offset])).toEqual([["LINT_UNDECLARED", 8]]);
  });

  it("flags a second declaration of the same name", () => {
    const diags = lint("var a = 1; var a = 2;");
    expect(diags.map((d) => [d.code, d.message, d.location.offset])).toEqual([
      ["LINT_REDECLARED", "Variable 'a' is already declared.", 15],
    ]);
  });

  it("treats predeclared names as declared", () => {
    expect(lint("print count;", ["count"]).map((d) => d.code)).toEqual(["LINT_UNBOUND_READ"]);
  });

  it("reports each undeclared reference", () => {
    expect(lint("print p + q;").map((d) => d.message)).toEqual([
      "Variable 'p' is not declared.",
      "Variable 'q' is not declared.",
    ]);
  });
});
