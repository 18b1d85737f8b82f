/**
 * Runtime values of the Tally VM.
 *
 * Values are plain tagged records copied by value: there is no heap and
 * nothing to collect.
 */

import type { NativeEntry } from "../builtins/native.js";

/**
 * Value kinds.
 */
export const enum ValueKind {
  Native = "native",
  Address = "address",
  Int = "int",
}

/** A native primitive resolved from a prototype. */
export interface NativeValue {
  readonly kind: ValueKind.Native;
  readonly native: NativeEntry;
}

/** Entry address of a compiled function, or a return address. */
export interface AddressValue {
  readonly kind: ValueKind.Address;
  readonly address: number;
}

/** Signed 64-bit integer. */
export interface IntValue {
  readonly kind: ValueKind.Int;
  readonly value: bigint;
}

export type Value = NativeValue | AddressValue | IntValue;

export function nativeValue(native: NativeEntry): NativeValue {
  return { kind: ValueKind.Native, native };
}

export function addressValue(address: number): AddressValue {
  return { kind: ValueKind.Address, address };
}

/**
 * Create an integer value, wrapping to signed 64 bits.
 */
export function intValue(value: bigint): IntValue {
  return { kind: ValueKind.Int, value: BigInt.asIntN(64, value) };
}

/**
 * Boolean coercion: natives and addresses are always truthy, integers are
 * truthy iff non-zero.
 */
export function isTruthy(value: Value): boolean {
  switch (value.kind) {
    case ValueKind.Native:
    case ValueKind.Address:
      return true;
    case ValueKind.Int:
      return value.value !== 0n;
  }
}

/**
 * Human-readable rendering for traces and error messages.
 */
export function inspect(value: Value): string {
  switch (value.kind) {
    case ValueKind.Native:
      return `<native ${value.native.name}>`;
    case ValueKind.Address:
      return `<address ${value.address}>`;
    case ValueKind.Int:
      return value.value.toString();
  }
}
