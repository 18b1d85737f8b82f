import { describe, it, expect } from "vitest";
import { disassemble, formatDisassembly, formatInstruction } from "./disasm.js";
import { Code, CodeBuilder } from "./code.js";
import { Op } from "./opcode.js";

function sample(): Code {
  const builder = new CodeBuilder();
  builder.emitOp(Op.PushFunc);
  builder.emitU32(12);
  builder.emitOp(Op.Call);
  builder.emitU32(0);
  builder.emitOp(Op.Pop);
  builder.emitOp(Op.Stop);
  builder.emitOp(Op.PushInt);
  builder.emitI64(-4n);
  builder.emitOp(Op.Return);
  builder.emitU32(0);
  builder.emitU32(0);
  return builder.toCode([], [{ name: "neg", address: 12, arity: 0 }], "t");
}

describe("disassemble", () => {
  it("should decode offsets and operands", () => {
    expect(disassemble(sample())).toEqual([
      { offset: 0, op: Op.PushFunc, operands: [12] },
      { offset: 5, op: Op.Call, operands: [0] },
      { offset: 10, op: Op.Pop, operands: [] },
      { offset: 11, op: Op.Stop, operands: [] },
      { offset: 12, op: Op.PushInt, operands: [-4n] },
      { offset: 21, op: Op.Return, operands: [0, 0] },
    ]);
  });

  it("should reject unknown opcodes", () => {
    expect(() => disassemble(new Code(new Uint8Array([Op.Stop, 42]), [], [], "t"))).toThrow(
      "unknown opcode 42 at offset 1"
    );
  });
});

describe("formatDisassembly", () => {
  it("should format one instruction", () => {
    expect(formatInstruction({ offset: 51, op: Op.Return, operands: [0, 2] })).toBe(
      "   51  Return 0 2"
    );
  });

  it("should label the entry point and functions", () => {
    expect(formatDisassembly(sample()).split("\n")).toEqual([
      "<main>:",
      "    0  PushFunc 12",
      "    5  Call 0",
      "   10  Pop",
      "   11  Stop",
      "neg/0:",
      "   12  PushInt -4",
      "   21  Return 0 0",
    ]);
  });
});
