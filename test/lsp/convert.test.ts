import { describe, expect, it } from "vitest";
import { CompletionItemKind, DiagnosticSeverity, InsertTextFormat, SymbolKind } from "vscode-languageserver";
import { TextDocument } from "vscode-languageserver-textdocument";
import { analyzeText } from "../../src/language/lox.language";
import {
  toLspCompletionItem,
  toLspDiagnostic,
  toLspDocumentSymbol,
  toLspRange,
  toLspSeverity,
} from "../../src/lsp/convert";
import { getDocumentSymbols } from "../../src/lsp/symbols";

const source = "var a;\nprint b;";
const doc = TextDocument.create("file:///test.lox", "lox", 1, source);

describe("toLspDiagnostic", () => {
  it("maps offsets to line/character positions", () => {
    const [d] = analyzeText(source).diagnostics;

    expect(toLspDiagnostic(d, doc)).toEqual({
      severity: DiagnosticSeverity.Warning,
      range: { start: { line: 1, character: 6 }, end: { line: 1, character: 7 } },
      message: "Variable 'b' is not declared.",
      code: "LINT_UNDECLARED",
      source: "lox",
    });
  });

  it("passes compile errors through at error severity", () => {
    const [d] = analyzeText("print ;").diagnostics;
    const parseDoc = TextDocument.create("file:///bad.lox", "lox", 1, "print ;");

    expect(toLspDiagnostic(d, parseDoc)).toEqual({
      severity: DiagnosticSeverity.Error,
      range: { start: { line: 0, character: 6 }, end: { line: 0, character: 7 } },
      message: "Expect expression.",
      code: "PARSE_ERROR",
      source: "lox",
    });
  });

  it("maps severities", () => {
    expect([toLspSeverity("error"), toLspSeverity("warning"), toLspSeverity("info")]).toEqual([
      DiagnosticSeverity.Error,
      DiagnosticSeverity.Warning,
      DiagnosticSeverity.Information,
    ]);
  });
});

describe("toLspRange", () => {
  it("clamps offsets past the end of the document", () => {
    expect(toLspRange({ start: 0, end: 500 }, doc)).toEqual({
      start: { line: 0, character: 0 },
      end: { line: 1, character: 8 },
    });
  });
});

describe("toLspCompletionItem", () => {
  it("marks snippets as snippet text", () => {
    const item = toLspCompletionItem({ label: "print statement", kind: "snippet", insertText: "print ${1:value};" });

    expect(item.kind).toBe(CompletionItemKind.Snippet);
    expect(item.insertTextFormat).toBe(InsertTextFormat.Snippet);
    expect(item.insertText).toBe("print ${1:value};");
  });

  it("inserts the label for plain items", () => {
    const item = toLspCompletionItem({ label: "print", kind: "keyword" });

    expect(item.kind).toBe(CompletionItemKind.Keyword);
    expect(item.insertTextFormat).toBe(InsertTextFormat.PlainText);
    expect(item.insertText).toBe("print");
  });
});

describe("toLspDocumentSymbol", () => {
  it("converts var symbols", () => {
    const [sym] = getDocumentSymbols(analyzeText(source).statements);

    expect(toLspDocumentSymbol(sym, doc)).toEqual({
      name: "a",
      kind: SymbolKind.Variable,
      detail: "var",
      range: { start: { line: 0, character: 4 }, end: { line: 0, character: 5 } },
      selectionRange: { start: { line: 0, character: 4 }, end: { line: 0, character: 5 } },
    });
  });
});
