import { Token, TokenKind, Position, newPosition, newToken, lookupIdentifier } from "../token/token.js";

/** Largest value a signed 64-bit integer literal may take. */
const MAX_INT64 = (1n << 63n) - 1n;

/**
 * Lexer error with position information.
 */
export class LexerError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at line ${position.line + 1}, column ${position.column + 1}`);
    this.name = "LexerError";
  }
}

const punctuation: Map<string, TokenKind> = new Map([
  ["+", TokenKind.PLUS],
  ["=", TokenKind.ASSIGN],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
  [":", TokenKind.COLON],
]);

function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Lexer tokenizes Tally source code.
 */
export class Lexer {
  private characters: string[];
  private position: number = -1;
  private nextPosition: number = 0;
  private ch: string = "";
  private line: number = 0;
  private column: number = -1;
  private file: string;
  private tokenStart: Position;

  constructor(input: string, file: string = "<input>") {
    this.characters = [...input];
    this.file = file;
    this.tokenStart = this.currentPosition();
    this.readChar();
  }

  private currentPosition(): Position {
    return newPosition(this.position, this.line, this.column, this.file);
  }

  /**
   * Read the next character, tracking line and column.
   */
  private readChar(): void {
    if (this.ch === "\n") {
      this.line++;
      this.column = -1;
    }
    if (this.nextPosition >= this.characters.length) {
      this.ch = "\0";
    } else {
      this.ch = this.characters[this.nextPosition];
    }
    this.position = this.nextPosition;
    this.nextPosition++;
    this.column++;
  }

  private peekChar(): string {
    if (this.nextPosition >= this.characters.length) {
      return "\0";
    }
    return this.characters[this.nextPosition];
  }

  /**
   * Skip whitespace and `//` line comments.
   */
  private skipTrivia(): void {
    for (;;) {
      while (isWhitespace(this.ch)) {
        this.readChar();
      }
      if (this.ch === "/" && this.peekChar() === "/") {
        this.skipToEndOfLine();
        continue;
      }
      return;
    }
  }

  private skipToEndOfLine(): void {
    while (this.ch !== "\n" && this.ch !== "\0") {
      this.readChar();
    }
  }

  private makeToken(kind: TokenKind, literal: string): Token {
    return newToken(kind, literal, this.tokenStart);
  }

  /**
   * Get the next token.
   */
  nextToken(): Token {
    this.skipTrivia();
    this.tokenStart = this.currentPosition();

    if (this.ch === "\0") {
      return this.makeToken(TokenKind.EOF, "");
    }

    if (this.ch === '"') {
      return this.readString();
    }

    if (isDigit(this.ch)) {
      return this.readNumber();
    }

    if (isLetter(this.ch)) {
      return this.readIdentifier();
    }

    const kind = punctuation.get(this.ch);
    if (kind !== undefined) {
      const literal = this.ch;
      this.readChar();
      return this.makeToken(kind, literal);
    }

    throw new LexerError(`unknown character '${this.ch}'`, this.tokenStart);
  }

  /**
   * Read an identifier or keyword.
   */
  private readIdentifier(): Token {
    const start = this.position;
    while (isLetter(this.ch) || isDigit(this.ch)) {
      this.readChar();
    }
    const literal = this.characters.slice(start, this.position).join("");
    return this.makeToken(lookupIdentifier(literal), literal);
  }

  /**
   * Read a decimal integer literal.
   */
  private readNumber(): Token {
    const start = this.position;
    while (isDigit(this.ch)) {
      this.readChar();
    }
    const literal = this.characters.slice(start, this.position).join("");
    if (isLetter(this.ch)) {
      throw new LexerError(`invalid number literal: ${literal}${this.ch}`, this.currentPosition());
    }
    if (BigInt(literal) > MAX_INT64) {
      throw new LexerError(`integer literal out of range: ${literal}`, this.tokenStart);
    }
    return this.makeToken(TokenKind.INT, literal);
  }

  /**
   * Read a double-quoted string literal. Strings only name primitives, so
   * there are no escape sequences.
   */
  private readString(): Token {
    const chars: string[] = [];
    this.readChar(); // consume opening quote

    while (this.ch !== '"' && this.ch !== "\0" && this.ch !== "\n") {
      chars.push(this.ch);
      this.readChar();
    }

    if (this.ch !== '"') {
      throw new LexerError("unterminated string literal", this.tokenStart);
    }

    this.readChar(); // consume closing quote
    return this.makeToken(TokenKind.STRING, chars.join(""));
  }
}

/**
 * Tokenize source code into an array of tokens, ending with EOF.
 */
export function tokenize(input: string, file?: string): Token[] {
  const lexer = new Lexer(input, file);
  const tokens: Token[] = [];
  let tok: Token;
  do {
    tok = lexer.nextToken();
    tokens.push(tok);
  } while (tok.kind !== TokenKind.EOF);
  return tokens;
}
