import { describe, it, expect } from "vitest";
import { LabelTable } from "./labels.js";
import { InternalError } from "./errors.js";
import { CodeBuilder } from "../bytecode/code.js";
import { Op } from "../bytecode/opcode.js";

function u32At(builder: CodeBuilder, offset: number): number {
  return builder.toCode([], [], "t").readU32(offset);
}

describe("LabelTable", () => {
  it("should create distinct labels", () => {
    const labels = new LabelTable();
    expect(labels.create().id).not.toBe(labels.create().id);
  });

  it("should emit the address of a placed label directly", () => {
    const labels = new LabelTable();
    const builder = new CodeBuilder();
    builder.emitOp(Op.Stop);
    const label = labels.create();
    expect(labels.place(label, builder)).toBe(1);
    builder.emitOp(Op.Jump);
    labels.reference(label, builder);
    expect(u32At(builder, 2)).toBe(1);
    expect(labels.pendingCount()).toBe(0);
  });

  it("should patch every forward reference when placed", () => {
    const labels = new LabelTable();
    const builder = new CodeBuilder();
    const label = labels.create();
    builder.emitOp(Op.Jump);
    labels.reference(label, builder);
    builder.emitOp(Op.PushFunc);
    labels.reference(label, builder);
    expect(labels.pendingCount()).toBe(2);
    expect(u32At(builder, 1)).toBe(0);

    builder.emitOp(Op.Stop);
    labels.place(label, builder);
    expect(u32At(builder, 1)).toBe(11);
    expect(u32At(builder, 6)).toBe(11);
    expect(labels.pendingCount()).toBe(0);
    expect(labels.addressOf(label)).toBe(11);
  });

  it("should reject placing a label twice", () => {
    const labels = new LabelTable();
    const builder = new CodeBuilder();
    const label = labels.create();
    labels.place(label, builder);
    expect(() => labels.place(label, builder)).toThrow(InternalError);
    expect(() => labels.place(label, builder)).toThrow(`label ${label.id} placed twice`);
  });

  it("should report unresolved references", () => {
    const labels = new LabelTable();
    const builder = new CodeBuilder();
    builder.emitOp(Op.Jump);
    labels.reference(labels.create(), builder);
    expect(() => labels.assertResolved()).toThrow("1 unresolved label reference(s)");
  });

  it("should allow labels that are never referenced", () => {
    const labels = new LabelTable();
    labels.create();
    expect(() => labels.assertResolved()).not.toThrow();
  });
});
