// src/core/parser.ts
//
// Lox Parser
// ----------
// Recursive-descent parser turning tokens (src/core/lexer.ts) into statements
// (src/core/ast.ts) plus parse errors.
//
// Grammar, lowest to highest precedence:
//
//   program     -> declaration* EOF
//   declaration -> "var" IDENTIFIER ( "=" expression )? ";" | statement
//   statement   -> "print" expression ";" | expression ";"
//   expression  -> equality
//   equality    -> comparison ( ( "!=" | "==" ) comparison )*
//   comparison  -> term ( ( ">" | ">=" | "<" | "<=" ) term )*
//   term        -> factor ( ( "+" | "-" ) factor )*
//   factor      -> unary ( ( "*" | "/" ) unary )*
//   unary       -> ( "!" | "-" ) unary | primary
//   primary     -> NUMBER | STRING | "true" | "false" | "nil"
//                | "(" expression ")" | IDENTIFIER
//
// Error recovery:
// - Every production returns a Result; a failure is an Err carrying a
//   ParseError and is handed straight back to the caller.
// - consume() and primary() are the only places a ParseError is created.
// - declaration() is the only place one is inspected: the error is recorded
//   and reported, the partial statement is dropped and the cursor
//   synchronizes to the next statement boundary.
//
// Exports:
//   - parseSource(source, reporter?): ParseResult
//   - parseTokens(tokens, reporter?): ParseResult
//   - Parser class, ParseError

import type { Expr, Stmt } from "./ast";
import { binary, expressionStmt, grouping, literal, printStmt, unary, variable, varStmt } from "./ast";
import { tokenize, TokenKind, type Token } from "./lexer";
import { andThen, err, isErr, map, ok, type Result } from "./result";
import type { ErrorReporter } from "../diagnostics/reporter";

/* =========================================================
   Parse result & errors
   ========================================================= */

export class ParseError {
  /** The token the parser was looking at when it gave up. */
  public readonly token: Token;
  public readonly message: string;

  constructor(token: Token, message: string) {
    this.token = token;
    this.message = message;
  }
}

type Parsed<T> = Result<T, ParseError>;

export type ParseResult = {
  statements: Stmt[];
  errors: ParseError[];
};

/* =========================================================
   Public helpers
   ========================================================= */

export function parseSource(source: string, reporter?: ErrorReporter): ParseResult {
  const lex = tokenize(source, reporter);
  return parseTokens(lex.tokens, reporter);
}

export function parseTokens(tokens: readonly Token[], reporter?: ErrorReporter): ParseResult {
  const parser = new Parser(tokens, reporter);
  const statements = parser.parse();
  return { statements, errors: parser.errors };
}

/* =========================================================
   Parser
   ========================================================= */

// Tokens that begin a statement; synchronize() stops in front of them.
const STATEMENT_STARTS: ReadonlySet<TokenKind> = new Set([
  TokenKind.CLASS,
  TokenKind.FUN,
  TokenKind.VAR,
  TokenKind.FOR,
  TokenKind.IF,
  TokenKind.WHILE,
  TokenKind.PRINT,
  TokenKind.RETURN,
]);

export class Parser {
  private readonly tokens: readonly Token[];
  private readonly reporter: ErrorReporter | null;
  private idx = 0;

  public readonly errors: ParseError[] = [];

  constructor(tokens: readonly Token[], reporter?: ErrorReporter) {
    this.tokens = withEof(tokens);
    this.reporter = reporter ?? null;
  }

  /* =========================================================
     Top-level
     ========================================================= */

  public parse(): Stmt[] {
    const statements: Stmt[] = [];

    while (!this.isAtEnd()) {
      const st = this.declaration();
      if (st) statements.push(st);
    }

    return statements;
  }

  /* =========================================================
     Statements
     ========================================================= */

  private declaration(): Stmt | null {
    const res = this.match(TokenKind.VAR) ? this.varDeclaration() : this.statement();
    if (!isErr(res)) return res.v;

    this.errors.push(res.e);
    this.reporter?.errorAt(res.e.token, res.e.message);
    this.synchronize();
    return null;
  }

  private varDeclaration(): Parsed<Stmt> {
    const name = this.consume(TokenKind.IDENTIFIER, "Expect variable name.");
    if (isErr(name)) return name;

    let initializer: Expr | null = null;
    if (this.match(TokenKind.EQUAL)) {
      const init = this.expression();
      if (isErr(init)) return init;
      initializer = init.v;
    }

    return map(this.consume(TokenKind.SEMICOLON, "Expect ';' after variable declaration."), () =>
      varStmt(name.v, initializer)
    );
  }

  private statement(): Parsed<Stmt> {
    if (this.match(TokenKind.PRINT)) return this.printStatement();
    return this.expressionStatement();
  }

  private printStatement(): Parsed<Stmt> {
    return andThen(this.expression(), (value) =>
      map(this.consume(TokenKind.SEMICOLON, "Expect ';' after value."), () => printStmt(value))
    );
  }

  private expressionStatement(): Parsed<Stmt> {
    return andThen(this.expression(), (expr) =>
      map(this.consume(TokenKind.SEMICOLON, "Expect ';' after expression."), () => expressionStmt(expr))
    );
  }

  /* =========================================================
     Expressions (one method per precedence level)
     ========================================================= */

  private expression(): Parsed<Expr> {
    return this.equality();
  }

  private equality(): Parsed<Expr> {
    return this.leftAssociative(() => this.comparison(), TokenKind.BANG_EQUAL, TokenKind.EQUAL_EQUAL);
  }

  private comparison(): Parsed<Expr> {
    return this.leftAssociative(
      () => this.term(),
      TokenKind.GREATER,
      TokenKind.GREATER_EQUAL,
      TokenKind.LESS,
      TokenKind.LESS_EQUAL
    );
  }

  private term(): Parsed<Expr> {
    return this.leftAssociative(() => this.factor(), TokenKind.MINUS, TokenKind.PLUS);
  }

  private factor(): Parsed<Expr> {
    return this.leftAssociative(() => this.unary(), TokenKind.SLASH, TokenKind.STAR);
  }

  private unary(): Parsed<Expr> {
    if (this.match(TokenKind.BANG, TokenKind.MINUS)) {
      const operator = this.previous();
      return map(this.unary(), (right) => unary(operator, right));
    }

    return this.primary();
  }

  private primary(): Parsed<Expr> {
    if (this.match(TokenKind.FALSE)) return ok(literal(false));
    if (this.match(TokenKind.TRUE)) return ok(literal(true));
    if (this.match(TokenKind.NIL)) return ok(literal(null));

    if (this.match(TokenKind.NUMBER, TokenKind.STRING)) {
      return ok(literal(this.previous().literal));
    }

    if (this.match(TokenKind.IDENTIFIER)) {
      return ok(variable(this.previous()));
    }

    if (this.match(TokenKind.LEFT_PAREN)) {
      return andThen(this.expression(), (expr) =>
        map(this.consume(TokenKind.RIGHT_PAREN, "Expect ')' after expression."), () => grouping(expr))
      );
    }

    return err(new ParseError(this.current(), "Expect expression."));
  }

  /** operand ( op operand )* folded to the left. */
  private leftAssociative(operand: () => Parsed<Expr>, ...operators: TokenKind[]): Parsed<Expr> {
    const first = operand();
    if (isErr(first)) return first;
    let expr = first.v;

    while (this.match(...operators)) {
      const operator = this.previous();
      const right = operand();
      if (isErr(right)) return right;
      expr = binary(expr, operator, right.v);
    }

    return ok(expr);
  }

  /* =========================================================
     Recovery
     ========================================================= */

  private synchronize(): void {
    this.advance();

    while (!this.isAtEnd()) {
      if (this.previous().kind === TokenKind.SEMICOLON) return;
      if (STATEMENT_STARTS.has(this.current().kind)) return;
      this.advance();
    }
  }

  /* =========================================================
     Cursor utilities
     ========================================================= */

  private current(): Token {
    return this.tokens[this.idx];
  }

  private previous(): Token {
    return this.tokens[Math.max(0, this.idx - 1)];
  }

  private isAtEnd(): boolean {
    return this.current().kind === TokenKind.EOF;
  }

  private check(kind: TokenKind): boolean {
    if (this.isAtEnd()) return false;
    return this.current().kind === kind;
  }

  private match(...kinds: TokenKind[]): boolean {
    for (const kind of kinds) {
      if (this.check(kind)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.idx++;
    return this.previous();
  }

  private consume(kind: TokenKind, message: string): Parsed<Token> {
    if (this.check(kind)) return ok(this.advance());
    return err(new ParseError(this.current(), message));
  }
}

/* =========================================================
   Utilities
   ========================================================= */

function withEof(tokens: readonly Token[]): readonly Token[] {
  const last = tokens.length > 0 ? tokens[tokens.length - 1] : undefined;
  if (last?.kind === TokenKind.EOF) return tokens;

  return [
    ...tokens,
    {
      kind: TokenKind.EOF,
      lexeme: "",
      literal: null,
      line: last?.line ?? 1,
      offset: last ? last.offset + last.lexeme.length : 0,
    },
  ];
}
