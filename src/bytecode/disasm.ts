/**
 * Bytecode disassembler.
 */

import { Code } from "./code.js";
import { CodeReader } from "./reader.js";
import { Op, OperandKind, isOp, opName, operandKinds } from "./opcode.js";

/**
 * A decoded instruction.
 */
export interface Instruction {
  /** Offset of the opcode byte. */
  offset: number;
  op: Op;
  /** Operands in encoding order. I64 operands are bigints. */
  operands: (number | bigint)[];
}

/**
 * Decode the whole instruction stream.
 */
export function disassemble(code: Code): Instruction[] {
  const reader = new CodeReader(code);
  const instructions: Instruction[] = [];
  while (!reader.isAtEnd()) {
    const offset = reader.pc;
    const op = reader.readOp();
    if (!isOp(op)) {
      throw new Error(`unknown opcode ${op} at offset ${offset}`);
    }
    const operands = operandKinds(op).map((kind): number | bigint =>
      kind === OperandKind.I64 ? reader.readI64() : reader.readU32()
    );
    instructions.push({ offset, op, operands });
  }
  return instructions;
}

/**
 * Render one instruction, e.g. `   18  PushFunc 40`.
 */
export function formatInstruction(instr: Instruction): string {
  const text = [opName(instr.op), ...instr.operands.map(String)].join(" ");
  return `${String(instr.offset).padStart(5)}  ${text}`;
}

/**
 * Render the code as text, one instruction per line, with a header line
 * before each function entry.
 */
export function formatDisassembly(code: Code): string {
  const lines: string[] = [];
  for (const instr of disassemble(code)) {
    if (instr.offset === 0) {
      lines.push("<main>:");
    }
    const fn = code.functionAt(instr.offset);
    if (fn !== undefined) {
      lines.push(`${fn.name}/${fn.arity}:`);
    }
    lines.push(formatInstruction(instr));
  }
  return lines.join("\n");
}
