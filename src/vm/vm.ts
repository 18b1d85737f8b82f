/**
 * Tally Virtual Machine - bytecode execution engine.
 *
 * The VM has a single operand stack and no call frames: arguments,
 * temporaries and return addresses all live on the stack, at positions the
 * compiler computed statically.
 */

import { Code } from "../bytecode/code.js";
import { CodeReader } from "../bytecode/reader.js";
import { Op, isOp } from "../bytecode/opcode.js";
import type { NativeEntry, NativeStack } from "../builtins/native.js";
import {
  Value,
  ValueKind,
  addressValue,
  inspect,
  intValue,
  isTruthy,
  nativeValue,
} from "../value/value.js";

/** Default maximum operand stack size. */
const MAX_STACK_SIZE = 65536;

/**
 * VM execution error.
 */
export class VMError extends Error {
  constructor(
    message: string,
    public readonly pc?: number
  ) {
    super(message);
    this.name = "VMError";
  }
}

/**
 * One executed instruction, reported before it runs.
 */
export interface TraceStep {
  /** Offset of the instruction. */
  pc: number;
  op: Op;
  /** Operand stack height before the instruction. */
  stackHeight: number;
}

/**
 * VM configuration options.
 */
export interface VMConfig {
  /** Maximum operand stack size. */
  maxStackSize?: number;
  /** Called before each instruction executes. */
  trace?: (step: TraceStep) => void;
}

/**
 * Tally Virtual Machine.
 */
export class VM implements NativeStack {
  /** Operand stack. */
  private stack: Value[] = [];
  /** Stack pointer (index of next free slot). */
  private sp: number = 0;
  private readonly maxStackSize: number;
  private readonly trace?: (step: TraceStep) => void;

  constructor(config: VMConfig = {}) {
    this.maxStackSize = config.maxStackSize ?? MAX_STACK_SIZE;
    this.trace = config.trace;
  }

  /**
   * Number of values on the operand stack.
   */
  get stackHeight(): number {
    return this.sp;
  }

  /**
   * Execute compiled bytecode from address 0 until Stop.
   */
  run(code: Code): void {
    this.stack = [];
    this.sp = 0;

    const reader = new CodeReader(code);
    for (;;) {
      const pc = reader.pc;
      if (reader.isAtEnd()) {
        throw new VMError(`program counter ${pc} is outside the code`, pc);
      }
      const byte = reader.readOp();
      if (!isOp(byte)) {
        throw new VMError(`unknown opcode ${byte}`, pc);
      }
      this.trace?.({ pc, op: byte, stackHeight: this.sp });
      if (byte === Op.Stop) {
        return;
      }
      try {
        this.step(byte, reader);
      } catch (err) {
        if (err instanceof RangeError) {
          throw new VMError(`truncated instruction at ${pc}: ${err.message}`, pc);
        }
        if (err instanceof VMError && err.pc === undefined) {
          throw new VMError(err.message, pc);
        }
        throw err;
      }
    }
  }

  /**
   * Execute one instruction whose opcode has been read.
   */
  private step(op: Op, reader: CodeReader): void {
    switch (op) {
      case Op.PushFunc:
        this.push(addressValue(reader.readAddress()));
        break;

      case Op.PushNative: {
        const index = reader.readU32();
        const entry = reader.code.getNative(index);
        if (entry === undefined) {
          throw new VMError(`native index ${index} is out of range`);
        }
        this.push(nativeValue(entry));
        break;
      }

      case Op.PushInt:
        this.push(intValue(reader.readI64()));
        break;

      case Op.Peek:
        this.push(this.peek(reader.readU32()));
        break;

      case Op.Pop:
        this.pop();
        break;

      case Op.Add: {
        const right = this.pop();
        const left = this.pop();
        if (left.kind !== ValueKind.Int || right.kind !== ValueKind.Int) {
          throw new VMError(`unsupported operand types for +: ${left.kind} and ${right.kind}`);
        }
        this.push(intValue(left.value + right.value));
        break;
      }

      case Op.Call:
        this.opCall(reader.readU32(), reader);
        break;

      case Op.Return:
        this.opReturn(reader.readU32(), reader.readU32(), reader);
        break;

      case Op.JumpFalse: {
        const target = reader.readAddress();
        if (!isTruthy(this.pop())) {
          reader.pc = target;
        }
        break;
      }

      case Op.Jump:
        reader.pc = reader.readAddress();
        break;

      case Op.Stop:
        break;
    }
  }

  /**
   * Call the value on top of the stack with `argc` arguments beneath it.
   */
  private opCall(argc: number, reader: CodeReader): void {
    const callee = this.pop();
    switch (callee.kind) {
      case ValueKind.Native:
        this.callNative(callee.native, argc);
        return;

      case ValueKind.Address: {
        const fn = reader.code.functionAt(callee.address);
        if (fn === undefined) {
          throw new VMError(`invalid call target: address ${callee.address} is not a function entry`);
        }
        if (fn.arity !== argc) {
          throw new VMError(`function '${fn.name}' expects ${fn.arity} argument(s), got ${argc}`);
        }
        this.requireHeight(argc);
        this.push(addressValue(reader.pc));
        reader.pc = callee.address;
        return;
      }

      case ValueKind.Int:
        throw new VMError(`cannot call value of type ${callee.kind}`);
    }
  }

  private callNative(native: NativeEntry, argc: number): void {
    if (native.arity !== argc) {
      throw new VMError(`native '${native.name}' expects ${native.arity} argument(s), got ${argc}`);
    }
    this.requireHeight(argc);
    const expected = this.sp - argc + 1;
    native.fn(this);
    if (this.sp !== expected) {
      throw new VMError(
        `native '${native.name}' must consume ${argc} argument(s) and push one result`
      );
    }
  }

  /**
   * Pop the result, drop `depth` temporaries, jump to the return address
   * beneath them, drop `nargs` arguments and push the result back.
   */
  private opReturn(depth: number, nargs: number, reader: CodeReader): void {
    const result = this.pop();
    this.drop(depth);
    const target = this.pop();
    if (target.kind !== ValueKind.Address) {
      throw new VMError(`invalid return address: ${inspect(target)}`);
    }
    this.drop(nargs);
    this.push(result);
    reader.pc = target.address;
  }

  // ===========================================================================
  // Stack Operations
  // ===========================================================================

  push(value: Value): void {
    if (this.sp >= this.maxStackSize) {
      throw new VMError("stack overflow");
    }
    this.stack[this.sp++] = value;
  }

  pop(): Value {
    if (this.sp === 0) {
      throw new VMError("stack underflow");
    }
    const value = this.stack[--this.sp];
    this.stack.length = this.sp;
    return value;
  }

  peek(depth: number = 0): Value {
    if (depth >= this.sp) {
      throw new VMError("stack underflow");
    }
    return this.stack[this.sp - 1 - depth];
  }

  popInt(): bigint {
    const value = this.pop();
    if (value.kind !== ValueKind.Int) {
      throw new VMError(`expected int, got ${value.kind}`);
    }
    return value.value;
  }

  pushInt(value: bigint): void {
    this.push(intValue(value));
  }

  private drop(count: number): void {
    this.requireHeight(count);
    this.sp -= count;
    this.stack.length = this.sp;
  }

  private requireHeight(count: number): void {
    if (this.sp < count) {
      throw new VMError("stack underflow");
    }
  }
}
