// src/core/lexer.ts
//
// Lox Lexer (Scanner)
// -------------------
// Converts raw source text into a flat, ordered token sequence terminated by EOF.
//
// Lexical rules:
// - Punctuation: ( ) { } , . - + ; * /
// - One-or-two char operators: ! != = == < <= > >=
// - Comments: // to end of line (no token emitted)
// - Strings: "double quoted", copied verbatim (no escapes), may span lines
// - Numbers: 123, 12.34 (a trailing '.' is not part of the number)
// - Identifiers: a Unicode letter or '_', then letters, digits or '_';
//   checked against the keyword table
//
// Notes:
// - Whitespace and newlines are discarded; '\n' only advances the line counter.
// - The cursor steps over whole code points, but offsets stay in UTF-16 units
//   so they line up with editor positions.
// - Errors never stop the scan. They are collected (and forwarded to the reporter
//   when one is given) and scanning continues with the next character.

import type { ErrorReporter } from "../diagnostics/reporter";

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  // Single-character tokens
  LEFT_PAREN = "LEFT_PAREN",
  RIGHT_PAREN = "RIGHT_PAREN",
  LEFT_BRACE = "LEFT_BRACE",
  RIGHT_BRACE = "RIGHT_BRACE",
  COMMA = "COMMA",
  DOT = "DOT",
  MINUS = "MINUS",
  PLUS = "PLUS",
  SEMICOLON = "SEMICOLON",
  SLASH = "SLASH",
  STAR = "STAR",

  // One or two character tokens
  BANG = "BANG",
  BANG_EQUAL = "BANG_EQUAL",
  EQUAL = "EQUAL",
  EQUAL_EQUAL = "EQUAL_EQUAL",
  GREATER = "GREATER",
  GREATER_EQUAL = "GREATER_EQUAL",
  LESS = "LESS",
  LESS_EQUAL = "LESS_EQUAL",

  // Literals
  IDENTIFIER = "IDENTIFIER",
  STRING = "STRING",
  NUMBER = "NUMBER",

  // Keywords
  AND = "AND",
  CLASS = "CLASS",
  ELSE = "ELSE",
  FALSE = "FALSE",
  FUN = "FUN",
  FOR = "FOR",
  IF = "IF",
  NIL = "NIL",
  OR = "OR",
  PRINT = "PRINT",
  RETURN = "RETURN",
  SUPER = "SUPER",
  THIS = "THIS",
  TRUE = "TRUE",
  VAR = "VAR",
  WHILE = "WHILE",

  // Meta
  EOF = "EOF",
}

/* =========================================================
   Token Types
   ========================================================= */

export type Literal = number | string | boolean | null;

export type Token = {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly literal: Literal;
  /** 1-based source line. */
  readonly line: number;
  /** Absolute offset of the first lexeme character (0-based). */
  readonly offset: number;
};

export type LexerError = {
  message: string;
  line: number;
  offset: number;
  length: number;
};

export type LexResult = {
  tokens: Token[];
  errors: LexerError[];
};

/* =========================================================
   Static tables
   ========================================================= */

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  ["(", TokenKind.LEFT_PAREN],
  [")", TokenKind.RIGHT_PAREN],
  ["{", TokenKind.LEFT_BRACE],
  ["}", TokenKind.RIGHT_BRACE],
  [",", TokenKind.COMMA],
  [".", TokenKind.DOT],
  ["-", TokenKind.MINUS],
  ["+", TokenKind.PLUS],
  [";", TokenKind.SEMICOLON],
  ["*", TokenKind.STAR],
]);

type OperatorPair = { readonly alone: TokenKind; readonly withEquals: TokenKind };

// First char -> kind when alone / kind when followed by '='
const OPERATORS: ReadonlyMap<string, OperatorPair> = new Map([
  ["!", { alone: TokenKind.BANG, withEquals: TokenKind.BANG_EQUAL }],
  ["=", { alone: TokenKind.EQUAL, withEquals: TokenKind.EQUAL_EQUAL }],
  ["<", { alone: TokenKind.LESS, withEquals: TokenKind.LESS_EQUAL }],
  [">", { alone: TokenKind.GREATER, withEquals: TokenKind.GREATER_EQUAL }],
]);

export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map([
  ["and", TokenKind.AND],
  ["class", TokenKind.CLASS],
  ["else", TokenKind.ELSE],
  ["false", TokenKind.FALSE],
  ["for", TokenKind.FOR],
  ["fun", TokenKind.FUN],
  ["if", TokenKind.IF],
  ["nil", TokenKind.NIL],
  ["or", TokenKind.OR],
  ["print", TokenKind.PRINT],
  ["return", TokenKind.RETURN],
  ["super", TokenKind.SUPER],
  ["this", TokenKind.THIS],
  ["true", TokenKind.TRUE],
  ["var", TokenKind.VAR],
  ["while", TokenKind.WHILE],
]);

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;
  private readonly reporter: ErrorReporter | null;

  private start = 0; // offset of the lexeme being scanned
  private i = 0; // offset of the next unread char
  private line = 1;

  private tokens: Token[] = [];
  private errors: LexerError[] = [];

  constructor(source: string, reporter?: ErrorReporter) {
    this.src = source;
    this.reporter = reporter ?? null;
  }

  public lex(): LexResult {
    while (!this.isEOF()) {
      this.start = this.i;
      this.scanToken();
    }

    this.tokens.push({
      kind: TokenKind.EOF,
      lexeme: "",
      literal: null,
      line: this.line,
      offset: this.i,
    });

    return { tokens: this.tokens, errors: this.errors };
  }

  private scanToken(): void {
    const c = this.advance();

    const single = PUNCTUATION.get(c);
    if (single !== undefined) {
      this.addToken(single);
      return;
    }

    const pair = OPERATORS.get(c);
    if (pair !== undefined) {
      this.addToken(this.match("=") ? pair.withEquals : pair.alone);
      return;
    }

    switch (c) {
      case "/":
        if (this.match("/")) {
          // comment runs to end of line; the '\n' itself is handled next iteration
          while (this.peek() !== "\n" && !this.isEOF()) this.advance();
        } else {
          this.addToken(TokenKind.SLASH);
        }
        return;

      case " ":
      case "\r":
      case "\t":
        return;

      case "\n":
        this.line++;
        return;

      case '"':
        this.lexString();
        return;

      default:
        break;
    }

    if (isDigit(c)) {
      this.lexNumber();
      return;
    }

    if (isIdentStart(c)) {
      this.lexIdentifierOrKeyword();
      return;
    }

    this.addError("Unexpected character.");
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  // code point starting at idx, "\0" past the end
  private charAt(idx: number): string {
    const cp = this.src.codePointAt(idx);
    return cp === undefined ? "\0" : String.fromCodePoint(cp);
  }

  private peek(): string {
    return this.charAt(this.i);
  }

  private peekNext(): string {
    return this.charAt(this.i + this.peek().length);
  }

  private advance(): string {
    const c = this.charAt(this.i);
    this.i += c.length;
    return c;
  }

  private match(expected: string): boolean {
    if (this.isEOF() || this.src[this.i] !== expected) return false;
    this.i++;
    return true;
  }

  private addToken(kind: TokenKind, literal: Literal = null): void {
    this.tokens.push({
      kind,
      lexeme: this.src.slice(this.start, this.i),
      literal,
      line: this.line,
      offset: this.start,
    });
  }

  private addError(message: string): void {
    const err: LexerError = {
      message,
      line: this.line,
      offset: this.start,
      length: Math.max(1, this.i - this.start),
    };
    this.errors.push(err);
    this.reporter?.error(err.line, err.message, { offset: err.offset, length: err.length });
  }

  /* =========================================================
     Literals
     ========================================================= */

  private lexString(): void {
    while (this.peek() !== '"' && !this.isEOF()) {
      if (this.peek() === "\n") this.line++;
      this.advance();
    }

    if (this.isEOF()) {
      this.addError("Unterminated string.");
      return;
    }

    this.advance(); // closing quote
    this.addToken(TokenKind.STRING, this.src.slice(this.start + 1, this.i - 1));
  }

  private lexNumber(): void {
    while (isDigit(this.peek())) this.advance();

    // fraction only when a digit follows the dot
    if (this.peek() === "." && isDigit(this.peekNext())) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    this.addToken(TokenKind.NUMBER, Number(this.src.slice(this.start, this.i)));
  }

  private lexIdentifierOrKeyword(): void {
    while (isIdentPart(this.peek())) this.advance();

    const text = this.src.slice(this.start, this.i);
    this.addToken(KEYWORDS.get(text) ?? TokenKind.IDENTIFIER);
  }
}

/* =========================================================
   Public helpers
   ========================================================= */

export function tokenize(source: string, reporter?: ErrorReporter): LexResult {
  return new Lexer(source, reporter).lex();
}

/* =========================================================
   Character utilities
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

const IDENT_START = /^[\p{L}_]$/u;
const IDENT_PART = /^[\p{L}\p{N}_]$/u;

function isIdentStart(c: string): boolean {
  return IDENT_START.test(c);
}

function isIdentPart(c: string): boolean {
  return IDENT_PART.test(c);
}
