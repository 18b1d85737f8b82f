/**
 * Semantic checks run between parsing and code generation.
 *
 * The compiler assumes every program it receives has passed these checks:
 * names resolve, direct calls match the callee's arity, and every function
 * body ends in a return.
 */

import * as ast from "../ast/nodes.js";
import { Position } from "../token/token.js";

/**
 * Verification error with position information.
 */
export class VerifierError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at line ${position.line + 1}, column ${position.column + 1}`);
    this.name = "VerifierError";
  }
}

interface Signature {
  kind: "function" | "prototype";
  arity: number;
}

/**
 * Names visible while checking one statement.
 */
interface Context {
  /** Parameter names of the enclosing function, empty at top level. */
  params: ReadonlySet<string>;
  /** Whether the statement sits inside a function body. */
  inFunction: boolean;
}

/**
 * Check whether a block's last statement always returns.
 */
function endsWithReturn(block: ast.Block): boolean {
  const last = block.stmts[block.stmts.length - 1];
  if (last instanceof ast.ReturnStmt) {
    return true;
  }
  return last instanceof ast.Block && endsWithReturn(last);
}

export class Verifier {
  private errors: VerifierError[] = [];
  private globals: Map<string, Signature> = new Map();

  /**
   * Verify a program, throwing the first error found.
   */
  verify(program: ast.Program): void {
    for (const item of program.items) {
      if (item instanceof ast.FuncDecl || item instanceof ast.ProtoDecl) {
        this.declare(item);
      }
    }

    const topLevel: Context = { params: new Set(), inFunction: false };
    for (const item of program.items) {
      if (item instanceof ast.FuncDecl) {
        this.verifyFunction(item);
      } else if (item instanceof ast.ProtoDecl) {
        this.checkParams(item);
      } else {
        this.verifyStmt(item, topLevel);
      }
    }

    if (this.errors.length > 0) {
      throw this.errors[0];
    }
  }

  /**
   * Get all verification errors.
   */
  getErrors(): VerifierError[] {
    return this.errors;
  }

  private report(message: string, position: Position): void {
    this.errors.push(new VerifierError(message, position));
  }

  private declare(decl: ast.FuncDecl | ast.ProtoDecl): void {
    const name = decl.name.name;
    if (this.globals.has(name)) {
      this.report(`duplicate declaration of '${name}'`, decl.name.pos());
      return;
    }
    this.globals.set(name, {
      kind: decl instanceof ast.FuncDecl ? "function" : "prototype",
      arity: decl.params.length,
    });
  }

  private checkParams(decl: ast.FuncDecl | ast.ProtoDecl): Set<string> {
    const names = new Set<string>();
    for (const param of decl.params) {
      const name = param.name.name;
      if (names.has(name)) {
        this.report(`duplicate parameter '${name}' in '${decl.name.name}'`, param.pos());
      }
      names.add(name);
    }
    return names;
  }

  private verifyFunction(decl: ast.FuncDecl): void {
    const params = this.checkParams(decl);
    if (!endsWithReturn(decl.body)) {
      this.report(`function '${decl.name.name}' must end with a return statement`, decl.pos());
    }
    this.verifyStmt(decl.body, { params, inFunction: true });
  }

  private verifyStmt(stmt: ast.Stmt, ctx: Context): void {
    switch (stmt.kind) {
      case "Block":
        for (const inner of stmt.stmts) {
          this.verifyStmt(inner, ctx);
        }
        return;
      case "WhileStmt":
        this.verifyExpr(stmt.cond, ctx);
        this.verifyStmt(stmt.body, ctx);
        return;
      case "ReturnStmt":
        if (!ctx.inFunction) {
          this.report("return outside of a function", stmt.pos());
        }
        this.verifyExpr(stmt.value, ctx);
        return;
      case "ExprStmt":
        this.verifyExpr(stmt.expr, ctx);
        return;
    }
  }

  private verifyExpr(expr: ast.Expr, ctx: Context): void {
    switch (expr.kind) {
      case "IntLit":
        return;
      case "Ident":
        if (!ctx.params.has(expr.name) && !this.globals.has(expr.name)) {
          this.report(`undefined name '${expr.name}'`, expr.pos());
        }
        return;
      case "BinaryExpr":
        this.verifyExpr(expr.left, ctx);
        this.verifyExpr(expr.right, ctx);
        return;
      case "CallExpr":
        this.verifyExpr(expr.callee, ctx);
        for (const arg of expr.args) {
          this.verifyExpr(arg, ctx);
        }
        this.checkArity(expr, ctx);
        return;
    }
  }

  /**
   * Check the argument count of calls that name a declaration directly.
   * Calls through parameters are checked by the VM at run time.
   */
  private checkArity(call: ast.CallExpr, ctx: Context): void {
    const callee = call.callee;
    if (!(callee instanceof ast.Ident) || ctx.params.has(callee.name)) {
      return;
    }
    const signature = this.globals.get(callee.name);
    if (signature && signature.arity !== call.args.length) {
      this.report(
        `${signature.kind} '${callee.name}' expects ${signature.arity} argument(s), got ${call.args.length}`,
        call.lparen
      );
    }
  }
}

/**
 * Verify a program, throwing the first error found.
 */
export function verify(program: ast.Program): void {
  new Verifier().verify(program);
}
