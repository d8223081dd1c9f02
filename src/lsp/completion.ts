// src/lsp/completion.ts
//
// Lox Completions Engine
// ----------------------
// The language server calls this from its completion handler.
// This module takes:
// - source text
// - cursor offset
// - parsed statements (for declared names)
// And returns completion items in a generic structure; server.ts maps them to
// LSP types.
//
// It avoids re-parsing at completion time: the identifier prefix is read from
// the text left of the cursor and matched against keywords and `var` names
// declared before the cursor.
//
// Exports:
//   - getCompletions(req): CompletionItem[]
//   - identifierPrefix(source, offset): string

import type { Stmt } from "../core/ast";
import { KEYWORDS } from "../core/lexer";

export type CompletionKind = "keyword" | "variable" | "snippet";

export type CompletionItem = {
  label: string;
  kind: CompletionKind;
  detail?: string;
  insertText?: string;
  sortText?: string;
};

export type CompletionRequest = {
  source: string;
  offset: number;
  statements: readonly Stmt[];

  maxItems?: number;
};

// Keywords the statement grammar actually parses; the rest are reserved.
const ACTIVE_KEYWORDS: ReadonlySet<string> = new Set(["var", "print", "true", "false", "nil"]);

export function getCompletions(req: CompletionRequest): CompletionItem[] {
  const maxItems = req.maxItems ?? 200;
  const prefix = identifierPrefix(req.source, req.offset);

  const out: CompletionItem[] = [];
  out.push(...variableItems(req.statements, req.offset));
  out.push(...keywordItems());
  out.push(...snippetItems());

  return limit(
    dedupe(out).filter((item) => item.label.startsWith(prefix)),
    maxItems
  );
}

/** The identifier characters immediately left of the cursor. */
export function identifierPrefix(source: string, offset: number): string {
  const left = source.slice(0, Math.max(0, Math.min(offset, source.length)));
  const m = left.match(/[\p{L}_][\p{L}\p{N}_]*$/u);
  return m ? m[0] : "";
}

/* =========================================================
   Item sources
   ========================================================= */

function variableItems(statements: readonly Stmt[], offset: number): CompletionItem[] {
  const out: CompletionItem[] = [];
  for (const st of statements) {
    if (st.kind !== "VarDeclaration") continue;
    // only names declared before the cursor are in scope
    if (st.name.offset >= offset) continue;
    out.push({
      label: st.name.lexeme,
      kind: "variable",
      detail: `var ${st.name.lexeme}`,
      sortText: `0_${st.name.lexeme}`,
    });
  }
  return out;
}

function keywordItems(): CompletionItem[] {
  return [...KEYWORDS.keys()].map((kw): CompletionItem => ({
    label: kw,
    kind: "keyword",
    detail: ACTIVE_KEYWORDS.has(kw) ? "keyword" : "reserved keyword",
    sortText: `${ACTIVE_KEYWORDS.has(kw) ? "1" : "3"}_${kw}`,
  }));
}

function snippetItems(): CompletionItem[] {
  return [
    { label: "var declaration", kind: "snippet", detail: "var name = value;", insertText: "var ${1:name} = ${2:value};", sortText: "2_var" },
    { label: "print statement", kind: "snippet", detail: "print value;", insertText: "print ${1:value};", sortText: "2_print" },
  ];
}

/* =========================================================
   Helpers
   ========================================================= */

function dedupe(items: CompletionItem[]): CompletionItem[] {
  const seen = new Set<string>();
  const out: CompletionItem[] = [];
  for (const it of items) {
    const key = `${it.kind}:${it.label}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(it);
  }
  return out;
}

function limit<T>(arr: T[], n: number): T[] {
  return arr.length > n ? arr.slice(0, n) : arr;
}
