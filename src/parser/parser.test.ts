import { describe, it, expect } from "vitest";
import { parse, Parser, ParserError } from "./parser.js";
import { Lexer } from "../lexer/lexer.js";
import * as ast from "../ast/nodes.js";

function firstStmt(source: string): ast.TopLevel {
  const prog = parse(source);
  expect(prog.items).toHaveLength(1);
  return prog.items[0];
}

function firstExpr(source: string): ast.Expr {
  const stmt = firstStmt(source);
  if (!(stmt instanceof ast.ExprStmt)) {
    throw new Error(`expected an expression statement, got ${stmt.kind}`);
  }
  return stmt.expr;
}

describe("Parser", () => {
  describe("expressions", () => {
    it("should parse identifiers", () => {
      const expr = firstExpr("foo");
      expect(expr).toBeInstanceOf(ast.Ident);
      expect(expr.toString()).toBe("foo");
    });

    it("should parse integers", () => {
      const expr = firstExpr("42");
      expect(expr).toBeInstanceOf(ast.IntLit);
      expect(expr instanceof ast.IntLit && expr.value).toBe(42n);
    });

    it("should parse addition as left associative", () => {
      expect(firstExpr("a + b + c").toString()).toBe("((a + b) + c)");
    });

    it("should honor grouping", () => {
      expect(firstExpr("a + (b + c)").toString()).toBe("(a + (b + c))");
    });

    it("should parse calls with arguments", () => {
      const expr = firstExpr("add(1, x + 2)");
      expect(expr).toBeInstanceOf(ast.CallExpr);
      expect(expr.toString()).toBe("add(1, (x + 2))");
    });

    it("should bind calls tighter than addition", () => {
      expect(firstExpr("f(1) + g()").toString()).toBe("(f(1) + g())");
    });

    it("should parse chained calls", () => {
      const expr = firstExpr("make()(1)");
      expect(expr.toString()).toBe("make()(1)");
      expect(expr instanceof ast.CallExpr && expr.callee).toBeInstanceOf(ast.CallExpr);
    });
  });

  describe("statements", () => {
    it("should parse while loops", () => {
      const stmt = firstStmt("while (read()) { print(1) }");
      expect(stmt).toBeInstanceOf(ast.WhileStmt);
      expect(stmt.toString()).toBe("while (read()) { print(1) }");
    });

    it("should accept optional semicolons", () => {
      const prog = parse("print(1); print(2)\nprint(3);");
      expect(prog.items).toHaveLength(3);
    });

    it("should parse nested blocks", () => {
      const stmt = firstStmt("{ { a; b } c }");
      expect(stmt).toBeInstanceOf(ast.Block);
      expect(stmt.toString()).toBe("{ { a; b }; c }");
    });
  });

  describe("declarations", () => {
    it("should parse function declarations", () => {
      const decl = firstStmt("func add(a: int, b: int): int { return a + b }");
      expect(decl).toBeInstanceOf(ast.FuncDecl);
      if (!(decl instanceof ast.FuncDecl)) return;
      expect(decl.name.name).toBe("add");
      expect(decl.params.map((p) => p.toString())).toEqual(["a: int", "b: int"]);
      expect(decl.returnType.name).toBe("int");
      expect(decl.body.stmts[0]).toBeInstanceOf(ast.ReturnStmt);
    });

    it("should parse prototypes", () => {
      const decl = firstStmt('func print(x: int): int = "print_int"');
      expect(decl).toBeInstanceOf(ast.ProtoDecl);
      expect(decl.toString()).toBe('func print(x: int): int = "print_int"');
    });

    it("should parse parameterless functions", () => {
      const decl = firstStmt("func seven(): int { return 7 }");
      expect(decl instanceof ast.FuncDecl && decl.params).toEqual([]);
    });

    it("should split items by kind", () => {
      const prog = parse(`
        func f(): int { return 1 }
        func p(x: int): int = "print_int"
        p(f())
      `);
      expect(prog.functions().map((f) => f.name.name)).toEqual(["f"]);
      expect(prog.prototypes().map((p) => p.name.name)).toEqual(["p"]);
      expect(prog.statements()).toHaveLength(1);
    });
  });

  describe("nesting limits", () => {
    it("should accept long addition chains up to the limit", () => {
      const expr = firstExpr("1" + " + 1".repeat(499));
      expect(expr).toBeInstanceOf(ast.BinaryExpr);
    });

    it("should reject addition chains that are too tall", () => {
      const parser = new Parser(new Lexer("1" + " + 1".repeat(30000)));
      expect(() => parser.parse()).toThrow("expression nesting too deep at line 1, column 1999");
      expect(parser.getErrors()).toHaveLength(1);
    });

    it("should count call chains", () => {
      expect(() => parse("f" + "()".repeat(600))).toThrow(
        "expression nesting too deep at line 1, column 1000"
      );
    });

    it("should reject deeply nested blocks", () => {
      const parser = new Parser(new Lexer("{".repeat(20000) + "}".repeat(20000)));
      expect(() => parser.parse()).toThrow("statements nested too deeply at line 1, column 501");
      expect(parser.getErrors()).toHaveLength(1);
    });

    it("should count while bodies as nesting", () => {
      expect(() => parse("while (1) ".repeat(600) + "x")).toThrow(
        "statements nested too deeply at line 1, column 5001"
      );
    });
  });

  describe("errors", () => {
    it("should report unexpected tokens", () => {
      expect(() => parse(")")).toThrow(ParserError);
      expect(() => parse(")")).toThrow("unexpected token ) at line 1, column 1");
    });

    it("should report a missing closing paren", () => {
      expect(() => parse("f(1")).toThrow("expected ), got EOF");
    });

    it("should report a prototype without a primitive name", () => {
      expect(() => parse("func p(x: int): int = 3")).toThrow("expected STRING, got INT");
    });

    it("should collect several errors", () => {
      const parser = new Parser(new Lexer("{ ) }\nfunc (x: int): int { return x }"));
      expect(() => parser.parse()).toThrow(ParserError);
      expect(parser.getErrors().map((e) => e.message)).toEqual([
        "unexpected token ) at line 1, column 3",
        "expected IDENT, got ( at line 2, column 6",
      ]);
    });
  });
});
