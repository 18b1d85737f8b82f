/**
 * Contract between the VM and host-provided native primitives.
 */

import type { Value } from "../value/value.js";

/**
 * Operand-stack access handed to a native routine while it runs.
 */
export interface NativeStack {
  /** Number of values currently on the stack. */
  readonly stackHeight: number;
  push(value: Value): void;
  pop(): Value;
  /** Value `depth` slots below the top (0 = top). */
  peek(depth?: number): Value;
  /** Pop a value that must be an integer. */
  popInt(): bigint;
  pushInt(value: bigint): void;
}

/**
 * A native routine. Called with its arguments on top of the stack (first
 * argument topmost), it must pop exactly its declared arity and push exactly
 * one result.
 */
export type NativeFn = (vm: NativeStack) => void;

/**
 * Registry of primitives by the name prototypes bind to.
 */
export type NativeRegistry = ReadonlyMap<string, NativeFn>;

/**
 * A prototype resolved against the registry at compile time.
 */
export interface NativeEntry {
  /** Prototype name in the source program. */
  readonly name: string;
  /** Registry name the prototype is bound to. */
  readonly primitive: string;
  /** Declared parameter count. */
  readonly arity: number;
  readonly fn: NativeFn;
}
