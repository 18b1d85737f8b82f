/**
 * VM module exports.
 */

export { VM, VMError } from "./vm.js";
export type { TraceStep, VMConfig } from "./vm.js";
