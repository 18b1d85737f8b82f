/**
 * Lexical scopes used while generating code.
 */

import type { NativeEntry } from "../builtins/native.js";
import type { Label } from "./labels.js";
import { InternalError, invariant } from "./errors.js";

/**
 * Scope kinds.
 */
export const enum ScopeKind {
  Global = "global",
  Function = "function",
  Block = "block",
}

/**
 * Binding kinds.
 */
export const enum BindingKind {
  Function = "function",
  Native = "native",
  Argument = "argument",
}

/**
 * What a name resolves to.
 */
export type Binding =
  | { readonly kind: BindingKind.Function; readonly label: Label }
  | { readonly kind: BindingKind.Native; readonly index: number; readonly entry: NativeEntry }
  | { readonly kind: BindingKind.Argument; readonly index: number };

/**
 * A scope in the chain. Global scopes hold functions and natives, function
 * scopes hold argument slots, block scopes hold nothing and defer to their
 * parent.
 */
export class Scope {
  private bindings: Map<string, Binding> = new Map();
  private arity: number = 0;

  private constructor(
    readonly kind: ScopeKind,
    readonly parent: Scope | null
  ) {}

  /**
   * Create the root scope of a program.
   */
  static global(): Scope {
    return new Scope(ScopeKind.Global, null);
  }

  /**
   * Create a function scope binding each parameter name to its slot.
   */
  functionScope(params: readonly string[]): Scope {
    const scope = new Scope(ScopeKind.Function, this);
    scope.arity = params.length;
    params.forEach((name, index) => {
      scope.bindings.set(name, { kind: BindingKind.Argument, index });
    });
    return scope;
  }

  /**
   * Create a block scope nested in this one.
   */
  blockScope(): Scope {
    return new Scope(ScopeKind.Block, this);
  }

  /**
   * Bind a name in the global scope.
   */
  define(name: string, binding: Binding): void {
    invariant(this.kind === ScopeKind.Global, `cannot define '${name}' in a ${this.kind} scope`);
    invariant(binding.kind !== BindingKind.Argument, `argument binding for '${name}' in the global scope`);
    invariant(!this.bindings.has(name), `'${name}' is already bound`);
    this.bindings.set(name, binding);
  }

  /**
   * Resolve a name, innermost scope first.
   */
  resolve(name: string): Binding {
    let scope: Scope | null = this;
    while (scope !== null) {
      const binding = scope.bindings.get(name);
      if (binding !== undefined) {
        return binding;
      }
      scope = scope.parent;
    }
    throw new InternalError(`unresolved name '${name}'`);
  }

  /**
   * Number of parameters of the innermost enclosing function, 0 outside one.
   */
  paramCount(): number {
    let scope: Scope | null = this;
    while (scope !== null) {
      if (scope.kind === ScopeKind.Function) {
        return scope.arity;
      }
      scope = scope.parent;
    }
    return 0;
  }
}
