// src/lsp/convert.ts
//
// Core model -> LSP protocol converters. Kept free of the connection so they
// can be exercised without a running server.

import {
  CompletionItemKind,
  DiagnosticSeverity,
  InsertTextFormat,
  SymbolKind,
  type CompletionItem,
  type Diagnostic,
  type DocumentSymbol,
  type Range,
} from "vscode-languageserver";
import type { TextDocument } from "vscode-languageserver-textdocument";

import type { Diagnostic as CoreDiagnostic } from "../diagnostics/errors";
import type { CompletionItem as CoreCompletionItem } from "./completion";
import type { LoxSymbol, OffsetRange } from "./symbols";

export const DIAGNOSTIC_SOURCE = "lox";

/* =========================================================
   Diagnostics
   ========================================================= */

export function toLspDiagnostic(d: CoreDiagnostic, doc: TextDocument): Diagnostic {
  return {
    severity: toLspSeverity(d.severity),
    range: toLspRange({ start: d.location.offset, end: d.location.offset + d.location.length }, doc),
    message: d.message,
    code: d.code,
    source: DIAGNOSTIC_SOURCE,
  };
}

export function toLspSeverity(sev: CoreDiagnostic["severity"]): DiagnosticSeverity {
  switch (sev) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
    case "info":
      return DiagnosticSeverity.Information;
  }
}

/* =========================================================
   Completions
   ========================================================= */

export function toLspCompletionItem(item: CoreCompletionItem): CompletionItem {
  return {
    label: item.label,
    kind: toLspCompletionKind(item.kind),
    detail: item.detail,
    insertText: item.insertText ?? item.label,
    insertTextFormat: item.kind === "snippet" ? InsertTextFormat.Snippet : InsertTextFormat.PlainText,
    sortText: item.sortText,
  };
}

function toLspCompletionKind(kind: CoreCompletionItem["kind"]): CompletionItemKind {
  switch (kind) {
    case "keyword":
      return CompletionItemKind.Keyword;
    case "snippet":
      return CompletionItemKind.Snippet;
    case "variable":
      return CompletionItemKind.Variable;
  }
}

/* =========================================================
   Symbols
   ========================================================= */

export function toLspDocumentSymbol(sym: LoxSymbol, doc: TextDocument): DocumentSymbol {
  return {
    name: sym.name,
    kind: SymbolKind.Variable,
    detail: sym.detail,
    range: toLspRange(sym.range, doc),
    selectionRange: toLspRange(sym.selectionRange, doc),
  };
}

/* =========================================================
   Ranges
   ========================================================= */

// positionAt clamps out-of-range offsets to the document bounds
export function toLspRange(r: OffsetRange, doc: TextDocument): Range {
  return {
    start: doc.positionAt(r.start),
    end: doc.positionAt(r.end),
  };
}
