#!/usr/bin/env node
// src/lsp/server.ts
//
// Lox Language Server (LSP)
// -------------------------
// Runs in its own Node.js process over stdio; any LSP client can spawn it.
// It provides:
// - Diagnostics (lexer + parser + lint), published on open/change, cleared on close
// - Completions (keywords, snippets, declared variables)
// - Document symbols (var declarations)
//
// It uses the Lox pipeline in:
// - src/language/lox.language.ts
// - src/lsp/completion.ts
// - src/lsp/symbols.ts
//
// Per-document options come from the nearest lox.config.json (see
// src/language/configuration.ts); client settings under "lox" can switch
// diagnostics or lint off on top of that. Files on disk whose extension is not
// in `files.extensions` are left alone.

import {
  createConnection,
  ProposedFeatures,
  TextDocuments,
  TextDocumentSyncKind,
  type CompletionItem,
  type DocumentSymbol,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node";

import { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";

import { analyzeText, type LoxLanguageResult } from "../language/lox.language";
import { DEFAULT_CONFIG, isSourceFile, loadConfig, type LoxConfig } from "../language/configuration";
import { createLogger } from "../utils/logger";
import { getCompletions } from "./completion";
import { toLspCompletionItem, toLspDiagnostic, toLspDocumentSymbol } from "./convert";
import { getDocumentSymbols } from "./symbols";

/* =========================================================
   Connection & Documents
   ========================================================= */

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const log = createLogger({
  name: "lox-server",
  timestamp: false,
  sink: {
    error: (msg) => connection.console.error(msg),
    warn: (msg) => connection.console.warn(msg),
    info: (msg) => connection.console.info(msg),
    debug: (msg) => connection.console.log(msg),
  },
});

/* =========================================================
   Settings
   ========================================================= */

// Client-side switches; project config decides everything else.
type ClientSettings = {
  diagnosticsEnabled: boolean;
  lintEnabled: boolean;
};

const DEFAULT_SETTINGS: ClientSettings = {
  diagnosticsEnabled: true,
  lintEnabled: true,
};

let clientSettings: ClientSettings = { ...DEFAULT_SETTINGS };

function readClientSettings(settings: unknown): ClientSettings {
  if (!isRecord(settings) || !isRecord(settings.lox)) return { ...DEFAULT_SETTINGS };
  const lox = settings.lox;
  return {
    diagnosticsEnabled: typeof lox.diagnosticsEnabled === "boolean" ? lox.diagnosticsEnabled : true,
    lintEnabled: typeof lox.lintEnabled === "boolean" ? lox.lintEnabled : true,
  };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/* =========================================================
   Cache per document
   ========================================================= */

type DocCache = {
  version: number;
  // null when the document is not Lox source for its project
  result: LoxLanguageResult | null;
  config: LoxConfig;
};

const cache = new Map<string, DocCache>();

/* =========================================================
   Initialize
   ========================================================= */

connection.onInitialize((_params: InitializeParams): InitializeResult => {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        resolveProvider: false,
      },
      documentSymbolProvider: true,
    },
  };
});

connection.onInitialized(() => {
  log.info("Lox language server initialized");
});

/* =========================================================
   Configuration changes
   ========================================================= */

connection.onDidChangeConfiguration(async (change) => {
  clientSettings = readClientSettings(change.settings);

  // settings change diagnostics output
  cache.clear();

  for (const doc of documents.all()) {
    await validateTextDocument(doc);
  }
});

/* =========================================================
   Document lifecycle
   ========================================================= */

documents.onDidClose((e) => {
  cache.delete(e.document.uri);
  void connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
});

documents.onDidChangeContent(async (change) => {
  await validateTextDocument(change.document);
});

/* =========================================================
   Diagnostics pipeline
   ========================================================= */

async function validateTextDocument(doc: TextDocument): Promise<void> {
  try {
    const { result, config } = await analyzeWithCache(doc);

    if (!result || !clientSettings.diagnosticsEnabled || !config.diagnostics.enabled) {
      await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
      return;
    }

    const limited = result.diagnostics.slice(0, config.diagnostics.maxNumberOfProblems);
    await connection.sendDiagnostics({
      uri: doc.uri,
      diagnostics: limited.map((d) => toLspDiagnostic(d, doc)),
    });
  } catch (err) {
    log.error(`validateTextDocument failed for ${doc.uri}`, err instanceof Error ? err.message : String(err));
    await connection.sendDiagnostics({ uri: doc.uri, diagnostics: [] });
  }
}

/* =========================================================
   Completion provider
   ========================================================= */

connection.onCompletion(async (params): Promise<CompletionItem[]> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];

  const { result } = await analyzeWithCache(doc);
  if (!result) return [];

  const items = getCompletions({
    source: doc.getText(),
    offset: doc.offsetAt(params.position),
    statements: result.statements,
    maxItems: 250,
  });

  return items.map(toLspCompletionItem);
});

/* =========================================================
   Document symbols
   ========================================================= */

connection.onDocumentSymbol(async (params): Promise<DocumentSymbol[]> => {
  const doc = documents.get(params.textDocument.uri);
  if (!doc) return [];

  const { result } = await analyzeWithCache(doc);
  if (!result) return [];
  return getDocumentSymbols(result.statements, doc.uri).map((s) => toLspDocumentSymbol(s, doc));
});

/* =========================================================
   Core analysis + project config
   ========================================================= */

async function analyzeWithCache(doc: TextDocument): Promise<DocCache> {
  const existing = cache.get(doc.uri);
  if (existing && existing.version === doc.version) return existing;

  const config = await resolveConfig(doc.uri);
  if (!isLoxDocument(doc.uri, config)) {
    log.debug(`skipping ${doc.uri}: extension not in files.extensions`);
    const skipped: DocCache = { version: doc.version, result: null, config };
    cache.set(doc.uri, skipped);
    return skipped;
  }

  const timer = log.time(`analyze ${doc.uri}`);
  const result = analyzeText(doc.getText(), {
    lint: { enabled: clientSettings.lintEnabled && config.lint.enabled },
  });
  timer.end({ diagnostics: result.diagnostics.length });

  const entry: DocCache = { version: doc.version, result, config };
  cache.set(doc.uri, entry);
  return entry;
}

async function resolveConfig(uri: string): Promise<LoxConfig> {
  const parsed = URI.parse(uri);
  if (parsed.scheme !== "file") return DEFAULT_CONFIG;

  const resolved = await loadConfig(parsed.fsPath);
  log.setLevel(resolved.logging.level);
  for (const w of resolved.warnings) {
    log.logOnce("warn", `config:${w}`, w);
  }
  return resolved;
}

// Untitled and other non-file documents are always analyzed.
function isLoxDocument(uri: string, config: LoxConfig): boolean {
  const parsed = URI.parse(uri);
  return parsed.scheme !== "file" || isSourceFile(parsed.fsPath, config);
}

/* =========================================================
   Start listening
   ========================================================= */

documents.listen(connection);
connection.listen();
