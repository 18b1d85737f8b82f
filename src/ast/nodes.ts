/**
 * AST node types for the Tally parser.
 *
 * The tree is immutable once built: the verifier and the compiler only read it.
 */

import type { Position } from "../token/token.js";

/**
 * Base interface for all AST nodes.
 */
export interface Node {
  /** Start position in source */
  pos(): Position;
  /** String representation */
  toString(): string;
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Integer literal.
 */
export class IntLit implements Node {
  readonly kind = "IntLit";

  constructor(
    public readonly position: Position,
    public readonly literal: string,
    public readonly value: bigint
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.literal;
  }
}

/**
 * Identifier (reference to a function, prototype or parameter).
 */
export class Ident implements Node {
  readonly kind = "Ident";

  constructor(
    public readonly position: Position,
    public readonly name: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.name;
  }
}

/**
 * Binary operators. Addition is the only one the language has.
 */
export type BinaryOp = "+";

/**
 * Binary operator expression.
 */
export class BinaryExpr implements Node {
  readonly kind = "BinaryExpr";

  constructor(
    public readonly left: Expr,
    public readonly opPos: Position,
    public readonly op: BinaryOp,
    public readonly right: Expr
  ) {}

  pos(): Position {
    return this.left.pos();
  }
  toString(): string {
    return `(${this.left.toString()} ${this.op} ${this.right.toString()})`;
  }
}

/**
 * Function call expression.
 */
export class CallExpr implements Node {
  readonly kind = "CallExpr";

  constructor(
    public readonly callee: Expr,
    public readonly lparen: Position,
    public readonly args: readonly Expr[]
  ) {}

  pos(): Position {
    return this.callee.pos();
  }
  toString(): string {
    return `${this.callee.toString()}(${this.args.map((a) => a.toString()).join(", ")})`;
  }
}

export type Expr = IntLit | Ident | BinaryExpr | CallExpr;

// ============================================================================
// Statements
// ============================================================================

/**
 * Block statement.
 */
export class Block implements Node {
  readonly kind = "Block";

  constructor(
    public readonly lbrace: Position,
    public readonly stmts: readonly Stmt[]
  ) {}

  pos(): Position {
    return this.lbrace;
  }
  toString(): string {
    return `{ ${this.stmts.map((s) => s.toString()).join("; ")} }`;
  }
}

/**
 * While loop.
 */
export class WhileStmt implements Node {
  readonly kind = "WhileStmt";

  constructor(
    public readonly whilePos: Position,
    public readonly cond: Expr,
    public readonly body: Stmt
  ) {}

  pos(): Position {
    return this.whilePos;
  }
  toString(): string {
    return `while (${this.cond.toString()}) ${this.body.toString()}`;
  }
}

/**
 * Return statement.
 */
export class ReturnStmt implements Node {
  readonly kind = "ReturnStmt";

  constructor(
    public readonly returnPos: Position,
    public readonly value: Expr
  ) {}

  pos(): Position {
    return this.returnPos;
  }
  toString(): string {
    return `return ${this.value.toString()}`;
  }
}

/**
 * Expression statement (expression evaluated for its effects).
 */
export class ExprStmt implements Node {
  readonly kind = "ExprStmt";

  constructor(public readonly expr: Expr) {}

  pos(): Position {
    return this.expr.pos();
  }
  toString(): string {
    return this.expr.toString();
  }
}

export type Stmt = Block | WhileStmt | ReturnStmt | ExprStmt;

// ============================================================================
// Declarations
// ============================================================================

/**
 * A declared parameter: `name: type`.
 */
export class Param implements Node {
  readonly kind = "Param";

  constructor(
    public readonly name: Ident,
    public readonly type: Ident
  ) {}

  pos(): Position {
    return this.name.pos();
  }
  toString(): string {
    return `${this.name.name}: ${this.type.name}`;
  }
}

function formatSignature(name: Ident, params: readonly Param[], returnType: Ident): string {
  return `func ${name.name}(${params.map((p) => p.toString()).join(", ")}): ${returnType.name}`;
}

/**
 * Function declaration: `func name(a: int): int { ... }`.
 */
export class FuncDecl implements Node {
  readonly kind = "FuncDecl";

  constructor(
    public readonly funcPos: Position,
    public readonly name: Ident,
    public readonly params: readonly Param[],
    public readonly returnType: Ident,
    public readonly body: Block
  ) {}

  pos(): Position {
    return this.funcPos;
  }
  toString(): string {
    return `${formatSignature(this.name, this.params, this.returnType)} ${this.body.toString()}`;
  }
}

/**
 * External prototype bound to a native primitive: `func name(a: int): int = "primitive"`.
 */
export class ProtoDecl implements Node {
  readonly kind = "ProtoDecl";

  constructor(
    public readonly funcPos: Position,
    public readonly name: Ident,
    public readonly params: readonly Param[],
    public readonly returnType: Ident,
    public readonly primitive: string
  ) {}

  pos(): Position {
    return this.funcPos;
  }
  toString(): string {
    return `${formatSignature(this.name, this.params, this.returnType)} = ${JSON.stringify(this.primitive)}`;
  }
}

export type TopLevel = FuncDecl | ProtoDecl | Stmt;

// ============================================================================
// Program
// ============================================================================

/**
 * Program is the root AST node.
 */
export class Program implements Node {
  constructor(public readonly items: readonly TopLevel[]) {}

  pos(): Position {
    if (this.items.length > 0) return this.items[0].pos();
    return { char: 0, line: 0, column: 0, file: "" };
  }
  toString(): string {
    return this.items.map((s) => s.toString()).join("\n");
  }

  /** Function declarations in source order. */
  functions(): FuncDecl[] {
    return this.items.filter((item): item is FuncDecl => item instanceof FuncDecl);
  }

  /** Prototype declarations in source order. */
  prototypes(): ProtoDecl[] {
    return this.items.filter((item): item is ProtoDecl => item instanceof ProtoDecl);
  }

  /** Bare top-level statements in source order. */
  statements(): Stmt[] {
    return this.items.filter(
      (item): item is Stmt => !(item instanceof FuncDecl) && !(item instanceof ProtoDecl)
    );
  }
}
