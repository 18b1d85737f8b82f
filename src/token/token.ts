/**
 * Token types for the Tally lexer.
 */
export const enum TokenKind {
  // Literals
  INT = "INT",
  STRING = "STRING",
  IDENT = "IDENT",

  // Operators
  PLUS = "+",
  ASSIGN = "=",

  // Punctuation
  LPAREN = "(",
  RPAREN = ")",
  LBRACE = "{",
  RBRACE = "}",
  COMMA = ",",
  SEMICOLON = ";",
  COLON = ":",

  // Keywords
  FUNC = "func",
  RETURN = "return",
  WHILE = "while",

  // Special
  EOF = "EOF",
}

/**
 * Keywords map for identifier lookup.
 */
const keywords: Map<string, TokenKind> = new Map([
  ["func", TokenKind.FUNC],
  ["return", TokenKind.RETURN],
  ["while", TokenKind.WHILE],
]);

/**
 * Look up an identifier to see if it's a keyword.
 */
export function lookupIdentifier(ident: string): TokenKind {
  return keywords.get(ident) ?? TokenKind.IDENT;
}

/**
 * Position in source code.
 */
export interface Position {
  /** Character offset within the file */
  char: number;
  /** 0-indexed line number */
  line: number;
  /** 0-indexed column number */
  column: number;
  /** Filename */
  file: string;
}

/**
 * Create a new Position.
 */
export function newPosition(char: number, line: number, column: number, file: string): Position {
  return { char, line, column, file };
}

/**
 * The zero value Position, used for synthesized nodes.
 */
export const NoPos: Position = {
  char: 0,
  line: 0,
  column: 0,
  file: "",
};

/**
 * A token produced by the lexer.
 */
export interface Token {
  kind: TokenKind;
  literal: string;
  start: Position;
}

/**
 * Create a new Token.
 */
export function newToken(kind: TokenKind, literal: string, start: Position): Token {
  return { kind, literal, start };
}
