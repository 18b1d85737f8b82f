/**
 * Native primitives available to Tally prototypes.
 */

import type { NativeFn } from "./native.js";
import type { NativeIO } from "./stdio.js";

/**
 * Create the standard primitive registry, reading and writing through `io`.
 *
 * Both primitives follow the common calling convention: they consume their
 * arguments and leave exactly one result.
 */
export function createBuiltins(io: NativeIO): Map<string, NativeFn> {
  const builtins = new Map<string, NativeFn>();

  // print_int - write an integer and a newline, returning the integer
  builtins.set("print_int", (vm) => {
    const value = vm.popInt();
    io.writeInt(value);
    vm.pushInt(value);
  });

  // read_int - read the next integer, 0 at end of input
  builtins.set("read_int", (vm) => {
    vm.pushInt(io.readInt());
  });

  return builtins;
}
