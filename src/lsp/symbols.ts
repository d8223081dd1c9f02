// src/lsp/symbols.ts
//
// Lox Document Symbols
// --------------------
// Symbol extraction the editor shows in:
// - Outline view
// - Breadcrumbs
// - Go to Symbol in File
//
// Ranges are absolute source offsets; server.ts converts them to LSP
// positions through TextDocument.positionAt.
//
// Exported API:
//   - getDocumentSymbols(statements, uri?): LoxSymbol[]

import type { Stmt, VarStmt } from "../core/ast";
import { printAst } from "../core/ast";

export type SymbolKind = "variable";

export type OffsetRange = {
  start: number;
  end: number;
};

export type LoxSymbol = {
  name: string;
  kind: SymbolKind;

  range: OffsetRange;
  selectionRange: OffsetRange;

  detail?: string;
  uri?: string;
};

/* =========================================================
   Public API
   ========================================================= */

export function getDocumentSymbols(statements: readonly Stmt[], uri?: string): LoxSymbol[] {
  const out: LoxSymbol[] = [];

  for (const st of statements) {
    if (st.kind === "VarDeclaration") out.push(symbolFromVarDecl(st, uri));
  }

  return sortSymbols(out);
}

/* =========================================================
   AST extraction
   ========================================================= */

function symbolFromVarDecl(node: VarStmt, uri?: string): LoxSymbol {
  const id = node.name;
  const range = { start: id.offset, end: id.offset + id.lexeme.length };

  return {
    name: id.lexeme,
    kind: "variable",
    range,
    selectionRange: range,
    detail: node.initializer ? `= ${printAst(node.initializer)}` : "var",
    uri,
  };
}

/* =========================================================
   Sorting
   ========================================================= */

function sortSymbols(list: LoxSymbol[]): LoxSymbol[] {
  return [...list].sort((a, b) => {
    const ao = a.range.start;
    const bo = b.range.start;
    if (ao !== bo) return ao - bo;
    return a.name.localeCompare(b.name);
  });
}
