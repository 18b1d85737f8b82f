/**
 * Builtins module exports.
 */

export { createBuiltins } from "./builtins.js";
export type { NativeEntry, NativeFn, NativeRegistry, NativeStack } from "./native.js";
export type { MemoryIO, NativeIO } from "./stdio.js";
export { createMemoryIO, createStdio, parseIntToken } from "./stdio.js";
