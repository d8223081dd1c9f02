// src/core/ast.ts
//
// Lox AST (Abstract Syntax Tree)
// ------------------------------
// Canonical node types shared by the toolchain:
//
//   Lexer  -> tokens
//   Parser -> AST (this file)
//   Lint / symbols -> static checks over the tree
//   Interpreter -> execution
//
// Two closed families, each a tagged union on `kind`:
// - Expr: Literal, Grouping, Unary, Binary, Variable
// - Stmt: ExpressionStatement, PrintStatement, VarDeclaration
//
// Nodes are built once by the parser and only traversed afterwards, so every
// field is readonly.

import type { Literal as LiteralValue, Token } from "./lexer";

/* =========================================================
   Node kinds
   ========================================================= */

export const EXPR_KINDS = ["Literal", "Grouping", "Unary", "Binary", "Variable"] as const;
export const STMT_KINDS = ["ExpressionStatement", "PrintStatement", "VarDeclaration"] as const;

export type ExprKind = (typeof EXPR_KINDS)[number];
export type StmtKind = (typeof STMT_KINDS)[number];
export type NodeKind = ExprKind | StmtKind;

/* =========================================================
   Expressions
   ========================================================= */

export type Expr = LiteralExpr | GroupingExpr | UnaryExpr | BinaryExpr | VariableExpr;

export type LiteralExpr = {
  readonly kind: "Literal";
  readonly value: LiteralValue;
};

export type GroupingExpr = {
  readonly kind: "Grouping";
  readonly expression: Expr;
};

export type UnaryExpr = {
  readonly kind: "Unary";
  /** BANG or MINUS */
  readonly operator: Token;
  readonly right: Expr;
};

export type BinaryExpr = {
  readonly kind: "Binary";
  readonly left: Expr;
  readonly operator: Token;
  readonly right: Expr;
};

export type VariableExpr = {
  readonly kind: "Variable";
  readonly name: Token;
};

/* =========================================================
   Statements
   ========================================================= */

export type Stmt = ExpressionStmt | PrintStmt | VarStmt;

export type ExpressionStmt = {
  readonly kind: "ExpressionStatement";
  readonly expression: Expr;
};

export type PrintStmt = {
  readonly kind: "PrintStatement";
  readonly expression: Expr;
};

export type VarStmt = {
  readonly kind: "VarDeclaration";
  readonly name: Token;
  readonly initializer: Expr | null;
};

export type Node = Expr | Stmt;

/* =========================================================
   Factories
   ========================================================= */

export function literal(value: LiteralValue): LiteralExpr {
  return { kind: "Literal", value };
}

export function grouping(expression: Expr): GroupingExpr {
  return { kind: "Grouping", expression };
}

export function unary(operator: Token, right: Expr): UnaryExpr {
  return { kind: "Unary", operator, right };
}

export function binary(left: Expr, operator: Token, right: Expr): BinaryExpr {
  return { kind: "Binary", left, operator, right };
}

export function variable(name: Token): VariableExpr {
  return { kind: "Variable", name };
}

export function expressionStmt(expression: Expr): ExpressionStmt {
  return { kind: "ExpressionStatement", expression };
}

export function printStmt(expression: Expr): PrintStmt {
  return { kind: "PrintStatement", expression };
}

export function varStmt(name: Token, initializer: Expr | null = null): VarStmt {
  return { kind: "VarDeclaration", name, initializer };
}

/* =========================================================
   Guards
   ========================================================= */

const EXPR_KIND_SET: ReadonlySet<string> = new Set<string>(EXPR_KINDS);
const STMT_KIND_SET: ReadonlySet<string> = new Set<string>(STMT_KINDS);

export function isExpr(node: Node): node is Expr {
  return EXPR_KIND_SET.has(node.kind);
}

export function isStmt(node: Node): node is Stmt {
  return STMT_KIND_SET.has(node.kind);
}

export function assertNeverNode(x: never): never {
  throw new Error(`Unhandled AST node: ${JSON.stringify(x)}`);
}

/* =========================================================
   AST Walker (visitor pattern)
   ========================================================= */

type Handler<T> = (node: T, parent: Node | null) => void;

export type Visitor = Partial<{
  enter: Handler<Node>;
  leave: Handler<Node>;

  Literal: Handler<LiteralExpr>;
  Grouping: Handler<GroupingExpr>;
  Unary: Handler<UnaryExpr>;
  Binary: Handler<BinaryExpr>;
  Variable: Handler<VariableExpr>;

  ExpressionStatement: Handler<ExpressionStmt>;
  PrintStatement: Handler<PrintStmt>;
  VarDeclaration: Handler<VarStmt>;
}>;

export function walkAst(root: Node | readonly Stmt[], visitor: Visitor): void {
  const visitNode = (node: Node, parent: Node | null): void => {
    visitor.enter?.(node, parent);

    switch (node.kind) {
      case "Literal":
        visitor.Literal?.(node, parent);
        break;
      case "Grouping":
        visitor.Grouping?.(node, parent);
        visitNode(node.expression, node);
        break;
      case "Unary":
        visitor.Unary?.(node, parent);
        visitNode(node.right, node);
        break;
      case "Binary":
        visitor.Binary?.(node, parent);
        visitNode(node.left, node);
        visitNode(node.right, node);
        break;
      case "Variable":
        visitor.Variable?.(node, parent);
        break;
      case "ExpressionStatement":
        visitor.ExpressionStatement?.(node, parent);
        visitNode(node.expression, node);
        break;
      case "PrintStatement":
        visitor.PrintStatement?.(node, parent);
        visitNode(node.expression, node);
        break;
      case "VarDeclaration":
        visitor.VarDeclaration?.(node, parent);
        if (node.initializer) visitNode(node.initializer, node);
        break;
      default:
        assertNeverNode(node);
    }

    visitor.leave?.(node, parent);
  };

  if (isNodeList(root)) {
    for (const st of root) visitNode(st, null);
  } else {
    visitNode(root, null);
  }
}

function isNodeList(x: Node | readonly Stmt[]): x is readonly Stmt[] {
  return Array.isArray(x);
}

/* =========================================================
   Printer (debug)
   ========================================================= */

/**
 * Renders a node in parenthesized prefix form, e.g. `(+ 1 (* 2 3))`.
 * Mostly useful in tests and when debugging the parser.
 */
export function printAst(node: Node): string {
  switch (node.kind) {
    case "Literal":
      return printLiteral(node.value);
    case "Grouping":
      return parenthesize("group", node.expression);
    case "Unary":
      return parenthesize(node.operator.lexeme, node.right);
    case "Binary":
      return parenthesize(node.operator.lexeme, node.left, node.right);
    case "Variable":
      return node.name.lexeme;
    case "ExpressionStatement":
      return parenthesize(";", node.expression);
    case "PrintStatement":
      return parenthesize("print", node.expression);
    case "VarDeclaration":
      return node.initializer
        ? `(var ${node.name.lexeme} = ${printAst(node.initializer)})`
        : `(var ${node.name.lexeme})`;
    default:
      return assertNeverNode(node);
  }
}

function parenthesize(name: string, ...parts: Expr[]): string {
  return `(${[name, ...parts.map(printAst)].join(" ")})`;
}

function printLiteral(value: LiteralValue): string {
  if (value === null) return "nil";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" && Object.is(value, -0)) return "-0";
  return String(value);
}
