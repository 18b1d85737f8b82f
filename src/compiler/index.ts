/**
 * Compiler module exports.
 */

export { Compiler, compile } from "./compiler.js";
export type { CompilerConfig } from "./compiler.js";
export { CompilerError, InternalError, invariant } from "./errors.js";
export { LabelTable } from "./labels.js";
export type { Label } from "./labels.js";
export { Scope, ScopeKind, BindingKind } from "./scope.js";
export type { Binding } from "./scope.js";
