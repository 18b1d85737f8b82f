/**
 * Pratt parser for Tally.
 */

import { Lexer } from "../lexer/lexer.js";
import { Token, TokenKind, Position } from "../token/token.js";
import { Precedence, getPrecedence } from "./precedence.js";
import * as ast from "../ast/nodes.js";

/**
 * Parser error with position information.
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at line ${position.line + 1}, column ${position.column + 1}`);
    this.name = "ParserError";
  }
}

type PrefixParseFn = () => ast.Expr | null;
type InfixParseFn = (left: ast.Expr) => ast.Expr | null;

/**
 * Deepest statement nesting and expression tree height the parser accepts.
 */
const MAX_NESTING = 500;

/**
 * Pratt parser for Tally source code.
 */
export class Parser {
  private lexer: Lexer;
  private curToken: Token;
  private peekToken: Token;
  private errors: ParserError[] = [];
  private depth = 0;
  private stmtDepth = 0;
  /** Tree height of non-leaf expressions parsed so far. */
  private heights: WeakMap<ast.Expr, number> = new WeakMap();

  private prefixParseFns: Map<TokenKind, PrefixParseFn> = new Map();
  private infixParseFns: Map<TokenKind, InfixParseFn> = new Map();

  constructor(lexer: Lexer) {
    this.lexer = lexer;
    this.curToken = this.lexer.nextToken();
    this.peekToken = this.lexer.nextToken();

    this.registerPrefix(TokenKind.IDENT, () => this.parseIdent());
    this.registerPrefix(TokenKind.INT, () => this.parseInt());
    this.registerPrefix(TokenKind.LPAREN, () => this.parseGrouped());

    this.registerInfix(TokenKind.PLUS, (left) => this.parseInfix(left));
    this.registerInfix(TokenKind.LPAREN, (left) => this.parseCall(left));
  }

  private registerPrefix(kind: TokenKind, fn: PrefixParseFn): void {
    this.prefixParseFns.set(kind, fn);
  }

  private registerInfix(kind: TokenKind, fn: InfixParseFn): void {
    this.infixParseFns.set(kind, fn);
  }

  private nextToken(): void {
    this.curToken = this.peekToken;
    if (this.peekToken.kind !== TokenKind.EOF) {
      this.peekToken = this.lexer.nextToken();
    }
  }

  private curTokenIs(kind: TokenKind): boolean {
    return this.curToken.kind === kind;
  }

  /**
   * Check the current token, recording an error when it does not match.
   */
  private expectCurrent(kind: TokenKind): boolean {
    if (this.curTokenIs(kind)) {
      return true;
    }
    this.errors.push(
      new ParserError(`expected ${kind}, got ${this.curToken.kind}`, this.curToken.start)
    );
    return false;
  }

  private curPrecedence(): Precedence {
    return getPrecedence(this.curToken.kind);
  }

  private skipSemicolon(): void {
    if (this.curTokenIs(TokenKind.SEMICOLON)) {
      this.nextToken();
    }
  }

  /**
   * Record a nesting-limit error and abandon the parse.
   */
  private tooDeep(message: string, position: Position): never {
    const err = new ParserError(message, position);
    this.errors.push(err);
    throw err;
  }

  /**
   * Record the height of a new expression node, failing once it exceeds
   * MAX_NESTING.
   */
  private measure<T extends ast.Expr>(node: T, at: Position, children: readonly ast.Expr[]): T {
    let tallest = 1;
    for (const child of children) {
      tallest = Math.max(tallest, this.heights.get(child) ?? 1);
    }
    const height = tallest + 1;
    if (height > MAX_NESTING) {
      this.tooDeep("expression nesting too deep", at);
    }
    this.heights.set(node, height);
    return node;
  }

  /**
   * Synchronize after an error by skipping to the next statement boundary.
   * At top level that is the next declaration; inside a block it is the next
   * statement keyword, and the closing brace is left for the block to consume.
   */
  private synchronize(inBlock: boolean): void {
    const failed = this.curToken;
    while (!this.curTokenIs(TokenKind.EOF)) {
      switch (this.curToken.kind) {
        case TokenKind.SEMICOLON:
          this.nextToken();
          return;
        case TokenKind.RBRACE:
          if (inBlock) {
            return;
          }
          break;
        case TokenKind.FUNC:
          if (this.curToken !== failed) {
            return;
          }
          break;
        case TokenKind.WHILE:
        case TokenKind.RETURN:
          if (inBlock && this.curToken !== failed) {
            return;
          }
          break;
      }
      this.nextToken();
    }
  }

  /**
   * Parse the entire program.
   */
  parse(): ast.Program {
    const items: ast.TopLevel[] = [];

    try {
      while (!this.curTokenIs(TokenKind.EOF)) {
        const item = this.curTokenIs(TokenKind.FUNC) ? this.parseDeclaration() : this.parseStatement();
        if (item) {
          items.push(item);
        } else {
          this.synchronize(false);
        }
      }
    } catch (err) {
      // Nesting limits stop the parse; the error is already recorded.
      if (!(err instanceof ParserError)) {
        throw err;
      }
    }

    if (this.errors.length > 0) {
      throw this.errors[0];
    }

    return new ast.Program(items);
  }

  /**
   * Get all parse errors.
   */
  getErrors(): ParserError[] {
    return this.errors;
  }

  // =========================================================================
  // Declaration Parsing
  // =========================================================================

  private parseDeclaration(): ast.FuncDecl | ast.ProtoDecl | null {
    const funcPos = this.curToken.start;
    this.nextToken(); // consume 'func'

    if (!this.expectCurrent(TokenKind.IDENT)) return null;
    const name = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    if (!this.expectCurrent(TokenKind.LPAREN)) return null;
    this.nextToken(); // consume '('

    const params: ast.Param[] = [];
    while (!this.curTokenIs(TokenKind.RPAREN) && !this.curTokenIs(TokenKind.EOF)) {
      const param = this.parseParam();
      if (!param) return null;
      params.push(param);

      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    if (!this.expectCurrent(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'

    if (!this.expectCurrent(TokenKind.COLON)) return null;
    this.nextToken(); // consume ':'

    if (!this.expectCurrent(TokenKind.IDENT)) return null;
    const returnType = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    if (this.curTokenIs(TokenKind.ASSIGN)) {
      this.nextToken(); // consume '='
      if (!this.expectCurrent(TokenKind.STRING)) return null;
      const primitive = this.curToken.literal;
      this.nextToken();
      this.skipSemicolon();
      return new ast.ProtoDecl(funcPos, name, params, returnType, primitive);
    }

    const body = this.parseBlock();
    if (!body) return null;
    this.skipSemicolon();
    return new ast.FuncDecl(funcPos, name, params, returnType, body);
  }

  private parseParam(): ast.Param | null {
    if (!this.expectCurrent(TokenKind.IDENT)) return null;
    const name = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    if (!this.expectCurrent(TokenKind.COLON)) return null;
    this.nextToken(); // consume ':'

    if (!this.expectCurrent(TokenKind.IDENT)) return null;
    const type = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    return new ast.Param(name, type);
  }

  // =========================================================================
  // Statement Parsing
  // =========================================================================

  private parseStatement(): ast.Stmt | null {
    this.stmtDepth++;
    if (this.stmtDepth > MAX_NESTING) {
      this.tooDeep("statements nested too deeply", this.curToken.start);
    }
    const stmt = this.parseStatementBody();
    this.stmtDepth--;
    return stmt;
  }

  private parseStatementBody(): ast.Stmt | null {
    let stmt: ast.Stmt | null;
    switch (this.curToken.kind) {
      case TokenKind.LBRACE:
        stmt = this.parseBlock();
        break;
      case TokenKind.WHILE:
        stmt = this.parseWhile();
        break;
      case TokenKind.RETURN:
        stmt = this.parseReturn();
        break;
      default: {
        const expr = this.parseExpression(Precedence.LOWEST);
        stmt = expr ? new ast.ExprStmt(expr) : null;
      }
    }
    if (stmt) {
      this.skipSemicolon();
    }
    return stmt;
  }

  private parseBlock(): ast.Block | null {
    if (!this.expectCurrent(TokenKind.LBRACE)) return null;
    const lbrace = this.curToken.start;
    this.nextToken(); // consume '{'

    const stmts: ast.Stmt[] = [];
    while (!this.curTokenIs(TokenKind.RBRACE) && !this.curTokenIs(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) {
        stmts.push(stmt);
      } else {
        this.synchronize(true);
      }
    }

    if (!this.expectCurrent(TokenKind.RBRACE)) return null;
    this.nextToken(); // consume '}'

    return new ast.Block(lbrace, stmts);
  }

  private parseWhile(): ast.WhileStmt | null {
    const whilePos = this.curToken.start;
    this.nextToken(); // consume 'while'

    if (!this.expectCurrent(TokenKind.LPAREN)) return null;
    this.nextToken(); // consume '('

    const cond = this.parseExpression(Precedence.LOWEST);
    if (!cond) return null;

    if (!this.expectCurrent(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'

    const body = this.parseStatement();
    if (!body) return null;

    return new ast.WhileStmt(whilePos, cond, body);
  }

  private parseReturn(): ast.ReturnStmt | null {
    const returnPos = this.curToken.start;
    this.nextToken(); // consume 'return'

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;

    return new ast.ReturnStmt(returnPos, value);
  }

  // =========================================================================
  // Expression Parsing
  // =========================================================================

  private parseExpression(precedence: Precedence): ast.Expr | null {
    this.depth++;
    if (this.depth > MAX_NESTING) {
      this.tooDeep("maximum expression depth exceeded", this.curToken.start);
    }

    const prefixFn = this.prefixParseFns.get(this.curToken.kind);
    if (!prefixFn) {
      this.errors.push(new ParserError(`unexpected token ${this.curToken.kind}`, this.curToken.start));
      this.depth--;
      return null;
    }

    let left = prefixFn();
    if (!left) {
      this.depth--;
      return null;
    }

    while (!this.curTokenIs(TokenKind.EOF) && precedence < this.curPrecedence()) {
      const infixFn = this.infixParseFns.get(this.curToken.kind);
      if (!infixFn) {
        break;
      }

      left = infixFn(left);
      if (!left) {
        this.depth--;
        return null;
      }
    }

    this.depth--;
    return left;
  }

  private parseIdent(): ast.Ident {
    const ident = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();
    return ident;
  }

  private parseInt(): ast.IntLit {
    const literal = this.curToken.literal;
    const node = new ast.IntLit(this.curToken.start, literal, BigInt(literal));
    this.nextToken();
    return node;
  }

  private parseGrouped(): ast.Expr | null {
    this.nextToken(); // consume '('

    const expr = this.parseExpression(Precedence.LOWEST);
    if (!expr) return null;

    if (!this.expectCurrent(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'

    return expr;
  }

  private parseInfix(left: ast.Expr): ast.BinaryExpr | null {
    const opPos = this.curToken.start;
    const precedence = this.curPrecedence();
    this.nextToken(); // consume '+'

    const right = this.parseExpression(precedence);
    if (!right) return null;

    return this.measure(new ast.BinaryExpr(left, opPos, "+", right), opPos, [left, right]);
  }

  private parseCall(callee: ast.Expr): ast.CallExpr | null {
    const lparen = this.curToken.start;
    this.nextToken(); // consume '('

    const args: ast.Expr[] = [];
    while (!this.curTokenIs(TokenKind.RPAREN) && !this.curTokenIs(TokenKind.EOF)) {
      const arg = this.parseExpression(Precedence.LOWEST);
      if (!arg) return null;
      args.push(arg);

      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    if (!this.expectCurrent(TokenKind.RPAREN)) return null;
    this.nextToken(); // consume ')'

    return this.measure(new ast.CallExpr(callee, lparen, args), lparen, [callee, ...args]);
  }
}

/**
 * Parse source code into an AST.
 */
export function parse(source: string, filename?: string): ast.Program {
  const lexer = new Lexer(source, filename);
  const parser = new Parser(lexer);
  return parser.parse();
}
