/**
 * Sequential reader over a Code container.
 */

import { Code } from "./code.js";

/**
 * Cursor over compiled bytecode. Each read advances `pc` by the size of the
 * value read.
 */
export class CodeReader {
  /** Offset of the next byte to read. */
  pc: number;

  constructor(
    readonly code: Code,
    pc: number = 0
  ) {
    this.pc = pc;
  }

  /**
   * Check if the cursor has reached the end of the bytecode.
   */
  isAtEnd(): boolean {
    return this.pc >= this.code.length;
  }

  /**
   * Read a raw opcode byte.
   */
  readOp(): number {
    const value = this.code.readU8(this.pc);
    this.pc += 1;
    return value;
  }

  /**
   * Read an unsigned 32-bit operand.
   */
  readU32(): number {
    const value = this.code.readU32(this.pc);
    this.pc += 4;
    return value;
  }

  /**
   * Read a code address operand.
   */
  readAddress(): number {
    return this.readU32();
  }

  /**
   * Read a signed 64-bit operand.
   */
  readI64(): bigint {
    const value = this.code.readI64(this.pc);
    this.pc += 8;
    return value;
  }
}
