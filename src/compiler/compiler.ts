/**
 * Single-pass bytecode compiler for Tally.
 *
 * Top-level statements are emitted first and terminated by Stop, so execution
 * always starts at address 0. Function bodies follow. Calls to functions that
 * have not been emitted yet go through labels and are patched once the
 * function body is placed.
 *
 * The compiler tracks how many values each construct leaves on the operand
 * stack. Argument references are compiled to Peek instructions whose operand
 * depends on that count, so it must be exact.
 */

import * as ast from "../ast/nodes.js";
import { Op } from "../bytecode/opcode.js";
import { Code, CodeBuilder, FunctionInfo } from "../bytecode/code.js";
import type { NativeEntry, NativeRegistry } from "../builtins/native.js";
import { CompilerError, invariant } from "./errors.js";
import { Label, LabelTable } from "./labels.js";
import { BindingKind, Scope } from "./scope.js";

/**
 * Compiler configuration.
 */
export interface CompilerConfig {
  /** Primitives that prototypes may bind to. */
  natives: NativeRegistry;
  /** Source filename. */
  filename?: string;
}

interface PendingFunction {
  decl: ast.FuncDecl;
  label: Label;
}

/**
 * Bytecode compiler for Tally.
 */
export class Compiler {
  private builder: CodeBuilder = new CodeBuilder();
  private labels: LabelTable = new LabelTable();
  private globals: Scope = Scope.global();
  private natives: NativeEntry[] = [];
  private pending: PendingFunction[] = [];
  private registry: NativeRegistry;
  private filename: string;
  /** Operand-stack slots pushed by the code emitted so far in this body. */
  private depth: number = 0;
  private used: boolean = false;

  constructor(config: CompilerConfig) {
    this.registry = config.natives;
    this.filename = config.filename ?? "<input>";
  }

  /**
   * Compile a verified program to bytecode. A Compiler compiles one program.
   */
  compile(program: ast.Program): Code {
    invariant(!this.used, "compiler instance already used");
    this.used = true;

    this.declare(program);

    this.depth = 0;
    for (const stmt of program.statements()) {
      this.compileStmt(stmt, this.globals);
    }
    invariant(this.depth === 0, `top level left ${this.depth} value(s) on the stack`);
    this.emit(Op.Stop);

    const functions: FunctionInfo[] = [];
    for (const { decl, label } of this.pending) {
      const address = this.labels.place(label, this.builder);
      this.compileFunction(decl);
      functions.push({ name: decl.name.name, address, arity: decl.params.length });
    }

    this.labels.assertResolved();
    return this.builder.toCode(this.natives, functions, this.filename);
  }

  /**
   * Bind every top-level declaration in the global scope.
   */
  private declare(program: ast.Program): void {
    for (const item of program.items) {
      if (item instanceof ast.FuncDecl) {
        const label = this.labels.create();
        this.globals.define(item.name.name, { kind: BindingKind.Function, label });
        this.pending.push({ decl: item, label });
      } else if (item instanceof ast.ProtoDecl) {
        const fn = this.registry.get(item.primitive);
        if (fn === undefined) {
          throw new CompilerError(
            `unknown primitive '${item.primitive}' for prototype '${item.name.name}'`,
            item.pos()
          );
        }
        const entry: NativeEntry = {
          name: item.name.name,
          primitive: item.primitive,
          arity: item.params.length,
          fn,
        };
        const index = this.natives.push(entry) - 1;
        this.globals.define(item.name.name, { kind: BindingKind.Native, index, entry });
      }
    }
  }

  private compileFunction(decl: ast.FuncDecl): void {
    const scope = this.globals.functionScope(decl.params.map((p) => p.name.name));
    this.depth = 0;
    this.compileStmt(decl.body, scope);
    invariant(this.depth === 0, `function '${decl.name.name}' ended at stack depth ${this.depth}`);
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  private compileStmt(stmt: ast.Stmt, scope: Scope): void {
    switch (stmt.kind) {
      case "Block":
        this.compileBlock(stmt, scope);
        return;
      case "WhileStmt":
        this.compileWhile(stmt, scope);
        return;
      case "ReturnStmt":
        this.compileExpr(stmt.value, scope);
        this.depth--;
        this.emit(Op.Return);
        this.builder.emitU32(this.depth);
        this.builder.emitU32(scope.paramCount());
        return;
      case "ExprStmt":
        this.compileExpr(stmt.expr, scope);
        this.emit(Op.Pop);
        this.depth--;
        return;
    }
  }

  private compileBlock(block: ast.Block, scope: Scope): void {
    const inner = scope.blockScope();
    const entry = this.depth;
    for (const stmt of block.stmts) {
      this.compileStmt(stmt, inner);
    }
    invariant(this.depth === entry, `block changed stack depth from ${entry} to ${this.depth}`);
  }

  private compileWhile(stmt: ast.WhileStmt, scope: Scope): void {
    const entry = this.labels.create();
    const exit = this.labels.create();

    this.labels.place(entry, this.builder);
    this.compileExpr(stmt.cond, scope);
    this.emit(Op.JumpFalse);
    this.labels.reference(exit, this.builder);
    this.depth--;

    this.compileStmt(stmt.body, scope);
    this.emit(Op.Jump);
    this.labels.reference(entry, this.builder);
    this.labels.place(exit, this.builder);
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  private compileExpr(expr: ast.Expr, scope: Scope): void {
    switch (expr.kind) {
      case "IntLit":
        this.emit(Op.PushInt);
        this.builder.emitI64(expr.value);
        this.depth++;
        return;
      case "Ident":
        this.compileIdent(expr, scope);
        return;
      case "BinaryExpr":
        this.compileExpr(expr.left, scope);
        this.compileExpr(expr.right, scope);
        this.emit(Op.Add);
        this.depth--;
        return;
      case "CallExpr":
        this.compileCall(expr, scope);
        return;
    }
  }

  private compileIdent(ident: ast.Ident, scope: Scope): void {
    const binding = scope.resolve(ident.name);
    switch (binding.kind) {
      case BindingKind.Function:
        this.emit(Op.PushFunc);
        this.labels.reference(binding.label, this.builder);
        break;
      case BindingKind.Native:
        this.emit(Op.PushNative);
        this.builder.emitU32(binding.index);
        break;
      case BindingKind.Argument:
        this.emit(Op.Peek);
        this.builder.emitU32(this.depth + binding.index + 1);
        break;
    }
    this.depth++;
  }

  /**
   * Arguments are pushed last to first so the first argument sits just under
   * the callee, then the return address once the call is made.
   */
  private compileCall(call: ast.CallExpr, scope: Scope): void {
    for (let i = call.args.length - 1; i >= 0; i--) {
      this.compileExpr(call.args[i], scope);
    }
    this.compileExpr(call.callee, scope);
    this.emit(Op.Call);
    this.builder.emitU32(call.args.length);
    this.depth -= call.args.length;
  }

  private emit(op: Op): void {
    this.builder.emitOp(op);
  }
}

/**
 * Compile a verified program to bytecode.
 */
export function compile(program: ast.Program, config: CompilerConfig): Code {
  return new Compiler(config).compile(program);
}
