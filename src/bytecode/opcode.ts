/**
 * Tally bytecode opcode definitions.
 *
 * Each instruction is a one-byte opcode followed by zero to two fixed-width
 * little-endian operands, laid out as {@link operandKinds} describes.
 */

/**
 * Bytecode opcodes for the Tally VM.
 */
export const enum Op {
  // =========================================================================
  // Push Operations
  // =========================================================================
  PushFunc = 0, // Push a function's entry address
  PushNative = 1, // Push a native primitive by table index
  Peek = 2, // Push a copy of the nth value from the top
  PushInt = 10, // Push a 64-bit integer constant

  // =========================================================================
  // Stack and Arithmetic
  // =========================================================================
  Pop = 3, // Discard top of stack
  Add = 5, // Integer addition

  // =========================================================================
  // Calls
  // =========================================================================
  Call = 4, // Call the value on top of the stack
  Return = 6, // Unwind temporaries, arguments and return address

  // =========================================================================
  // Jumps
  // =========================================================================
  JumpFalse = 7, // Pop and jump if falsy
  Jump = 8, // Unconditional jump

  // =========================================================================
  // Execution Control
  // =========================================================================
  Stop = 9, // Stop execution
}

/**
 * Operand encodings.
 */
export const enum OperandKind {
  /** Code address, resolved through a label. */
  Address = "addr",
  /** Unsigned 32-bit count or index. */
  U32 = "u32",
  /** Signed 64-bit integer. */
  I64 = "i64",
}

/** Width in bytes of an opcode. */
export const OPCODE_SIZE = 1;
/** Width in bytes of an address operand. */
export const ADDRESS_SIZE = 4;

/**
 * Width in bytes of an operand.
 */
export function operandSize(kind: OperandKind): number {
  switch (kind) {
    case OperandKind.Address:
    case OperandKind.U32:
      return 4;
    case OperandKind.I64:
      return 8;
  }
}

/**
 * Check whether a byte is a valid opcode.
 */
export function isOp(byte: number): byte is Op {
  return Number.isInteger(byte) && byte >= Op.PushFunc && byte <= Op.PushInt;
}

/**
 * Operand layout for an opcode.
 */
export function operandKinds(op: Op): readonly OperandKind[] {
  switch (op) {
    case Op.Pop:
    case Op.Add:
    case Op.Stop:
      return [];

    case Op.PushFunc:
    case Op.JumpFalse:
    case Op.Jump:
      return [OperandKind.Address];

    case Op.PushNative:
    case Op.Peek:
    case Op.Call:
      return [OperandKind.U32];

    case Op.Return:
      return [OperandKind.U32, OperandKind.U32];

    case Op.PushInt:
      return [OperandKind.I64];
  }
}

/**
 * Total encoded size of an instruction, opcode included.
 */
export function instructionSize(op: Op): number {
  return operandKinds(op).reduce((size, kind) => size + operandSize(kind), OPCODE_SIZE);
}

/**
 * Get opcode name for debugging.
 */
export function opName(op: Op): string {
  switch (op) {
    case Op.PushFunc:
      return "PushFunc";
    case Op.PushNative:
      return "PushNative";
    case Op.Peek:
      return "Peek";
    case Op.Pop:
      return "Pop";
    case Op.Call:
      return "Call";
    case Op.Add:
      return "Add";
    case Op.Return:
      return "Return";
    case Op.JumpFalse:
      return "JumpFalse";
    case Op.Jump:
      return "Jump";
    case Op.Stop:
      return "Stop";
    case Op.PushInt:
      return "PushInt";
  }
}
