import { describe, expect, it } from "vitest";
import {
  binary,
  grouping,
  isExpr,
  isStmt,
  literal,
  printAst,
  unary,
  varStmt,
  walkAst,
  type NodeKind,
} from "../../src/core/ast";
import { TokenKind, type Token } from "../../src/core/lexer";
import { parseSource } from "../../src/core/parser";

const tok = (kind: TokenKind, lexeme: string): Token => ({ kind, lexeme, literal: null, line: 1, offset: 0 });

describe("printAst", () => {
  it("renders expressions in prefix form", () => {
    const expr = binary(
      unary(tok(TokenKind.MINUS, "-"), literal(123)),
      tok(TokenKind.STAR, "*"),
      grouping(literal(45.67))
    );
    expect(printAst(expr)).toBe("(* (- 123) (group 45.67))");
  });

  it("renders literal values", () => {
    expect([literal(null), literal("hi"), literal(-0), literal(true), literal(2)].map(printAst)).toEqual([
      "nil",
      '"hi"',
      "-0",
      "true",
      "2",
    ]);
  });

  it("renders declarations with and without initializer", () => {
    const name = tok(TokenKind.IDENTIFIER, "a");
    expect(printAst(varStmt(name, literal(1)))).toBe("(var a = 1)");
    expect(printAst(varStmt(name))).toBe("(var a)");
  });
});

describe("walkAst", () => {
  it("visits nodes depth-first, left to right", () => {
    const { statements } = parseSource("print -(1 + x); var y = 2;");
    const entered: NodeKind[] = [];
    const left: NodeKind[] = [];

    walkAst(statements, {
      enter: (node) => entered.push(node.kind),
      leave: (node) => left.push(node.kind),
    });

    expect(entered).toEqual([
      "PrintStatement",
      "Unary",
      "Grouping",
      "Binary",
      "Literal",
      "Variable",
      "VarDeclaration",
      "Literal",
    ]);
    expect(left.slice(0, 3)).toEqual(["Literal", "Variable", "Binary"]);
  });

  it("calls per-kind handlers with the parent node", () => {
    const { statements } = parseSource("a + b;");
    const seen: string[] = [];

    walkAst(statements, {
      Variable: (node, parent) => seen.push(`${node.name.lexeme}<${parent?.kind ?? "root"}`),
    });

    expect(seen).toEqual(["a<Binary", "b<Binary"]);
  });
});

describe("node guards", () => {
  it("tells expressions from statements", () => {
    const expr = literal(1);
    const stmt = varStmt(tok(TokenKind.IDENTIFIER, "v"));

    expect([isExpr(expr), isStmt(expr), isExpr(stmt), isStmt(stmt)]).toEqual([true, false, false, true]);
  });
});
