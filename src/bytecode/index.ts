/**
 * Bytecode module exports.
 */

export {
  Op,
  OperandKind,
  OPCODE_SIZE,
  ADDRESS_SIZE,
  operandSize,
  operandKinds,
  instructionSize,
  isOp,
  opName,
} from "./opcode.js";

export { Code, CodeBuilder } from "./code.js";
export type { FunctionInfo } from "./code.js";
export { CodeReader } from "./reader.js";
export { disassemble, formatInstruction, formatDisassembly } from "./disasm.js";
export type { Instruction } from "./disasm.js";
