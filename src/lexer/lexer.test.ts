import { describe, it, expect } from "vitest";
import { Lexer, tokenize, LexerError } from "./lexer.js";
import { TokenKind } from "../token/token.js";

describe("Lexer", () => {
  describe("basic tokens", () => {
    it("should tokenize empty input", () => {
      const tokens = tokenize("");
      expect(tokens).toHaveLength(1);
      expect(tokens[0].kind).toBe(TokenKind.EOF);
    });

    it("should tokenize identifiers", () => {
      const tokens = tokenize("foo bar _baz x1");
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.IDENT,
        TokenKind.IDENT,
        TokenKind.IDENT,
        TokenKind.IDENT,
        TokenKind.EOF,
      ]);
      expect(tokens.map((t) => t.literal)).toEqual(["foo", "bar", "_baz", "x1", ""]);
    });

    it("should tokenize keywords", () => {
      const tokens = tokenize("func return while");
      expect(tokens[0].kind).toBe(TokenKind.FUNC);
      expect(tokens[1].kind).toBe(TokenKind.RETURN);
      expect(tokens[2].kind).toBe(TokenKind.WHILE);
    });

    it("should tokenize punctuation", () => {
      const tokens = tokenize("( ) { } : ; = , +");
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.LPAREN,
        TokenKind.RPAREN,
        TokenKind.LBRACE,
        TokenKind.RBRACE,
        TokenKind.COLON,
        TokenKind.SEMICOLON,
        TokenKind.ASSIGN,
        TokenKind.COMMA,
        TokenKind.PLUS,
        TokenKind.EOF,
      ]);
    });
  });

  describe("literals", () => {
    it("should tokenize integers", () => {
      const tokens = tokenize("42 0 9223372036854775807");
      expect(tokens[0].kind).toBe(TokenKind.INT);
      expect(tokens[0].literal).toBe("42");
      expect(tokens[1].literal).toBe("0");
      expect(tokens[2].literal).toBe("9223372036854775807");
    });

    it("should reject integers outside the 64-bit range", () => {
      expect(() => tokenize("9223372036854775808")).toThrow(LexerError);
      expect(() => tokenize("9223372036854775808")).toThrow("integer literal out of range");
    });

    it("should reject letters glued to numbers", () => {
      expect(() => tokenize("12ab")).toThrow("invalid number literal: 12a");
    });

    it("should tokenize strings", () => {
      const tokens = tokenize('"print_int"');
      expect(tokens[0].kind).toBe(TokenKind.STRING);
      expect(tokens[0].literal).toBe("print_int");
    });

    it("should reject unterminated strings", () => {
      expect(() => tokenize('"print_int')).toThrow("unterminated string literal at line 1, column 1");
    });
  });

  describe("trivia", () => {
    it("should skip line comments", () => {
      const tokens = tokenize("a // comment\nb");
      expect(tokens.map((t) => t.literal)).toEqual(["a", "b", ""]);
    });

    it("should skip consecutive comments and a comment at end of input", () => {
      const tokens = tokenize("1 // one\n// two\n  // three\n2 // end");
      expect(tokens.map((t) => t.literal)).toEqual(["1", "2", ""]);
      expect(tokens[1].start.line).toBe(3);
    });

    it("should reject a single slash", () => {
      expect(() => tokenize("a / b")).toThrow("unknown character '/' at line 1, column 3");
    });

    it("should report unknown characters with their position", () => {
      expect(() => tokenize("a\n  $")).toThrow("unknown character '$' at line 2, column 3");
    });
  });

  describe("positions", () => {
    it("should track line and column", () => {
      const lexer = new Lexer("func f\n  x", "main.tly");
      const func = lexer.nextToken();
      const f = lexer.nextToken();
      const x = lexer.nextToken();
      expect(func.start).toEqual({ char: 0, line: 0, column: 0, file: "main.tly" });
      expect(f.start).toEqual({ char: 5, line: 0, column: 5, file: "main.tly" });
      expect(x.start).toEqual({ char: 9, line: 1, column: 2, file: "main.tly" });
    });
  });
});
