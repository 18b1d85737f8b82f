import { describe, it, expect } from "vitest";
import { BindingKind, Scope, ScopeKind } from "./scope.js";
import { InternalError } from "./errors.js";
import { LabelTable } from "./labels.js";

describe("Scope", () => {
  const label = new LabelTable().create();

  it("should resolve globals from nested scopes", () => {
    const global = Scope.global();
    global.define("main", { kind: BindingKind.Function, label });
    const inner = global.functionScope(["a"]).blockScope().blockScope();
    expect(inner.kind).toBe(ScopeKind.Block);
    expect(inner.resolve("main")).toEqual({ kind: BindingKind.Function, label });
  });

  it("should bind parameters to declaration-order slots", () => {
    const fn = Scope.global().functionScope(["a", "b", "c"]);
    expect(fn.resolve("a")).toEqual({ kind: BindingKind.Argument, index: 0 });
    expect(fn.resolve("c")).toEqual({ kind: BindingKind.Argument, index: 2 });
  });

  it("should let parameters shadow globals", () => {
    const global = Scope.global();
    global.define("f", { kind: BindingKind.Function, label });
    const fn = global.functionScope(["f"]);
    expect(fn.blockScope().resolve("f")).toEqual({ kind: BindingKind.Argument, index: 0 });
    expect(global.resolve("f").kind).toBe(BindingKind.Function);
  });

  it("should count parameters of the enclosing function", () => {
    const global = Scope.global();
    expect(global.paramCount()).toBe(0);
    expect(global.functionScope(["a", "b"]).blockScope().paramCount()).toBe(2);
  });

  it("should fail on unresolved names", () => {
    expect(() => Scope.global().functionScope([]).resolve("nope")).toThrow(InternalError);
  });

  it("should only define names in the global scope", () => {
    const global = Scope.global();
    expect(() => global.blockScope().define("f", { kind: BindingKind.Function, label })).toThrow(
      "cannot define 'f' in a block scope"
    );
    global.define("f", { kind: BindingKind.Function, label });
    expect(() => global.define("f", { kind: BindingKind.Function, label })).toThrow(
      "'f' is already bound"
    );
  });
});
