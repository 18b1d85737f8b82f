/**
 * Compiled bytecode container.
 */

import type { NativeEntry } from "../builtins/native.js";
import { Op, OPCODE_SIZE } from "./opcode.js";

/** Largest value an unsigned 32-bit operand can hold. */
const MAX_U32 = 0xffffffff;

/**
 * Function metadata recorded alongside the bytecode.
 */
export interface FunctionInfo {
  /** Function name. */
  name: string;
  /** Entry address. */
  address: number;
  /** Number of parameters. */
  arity: number;
}

/**
 * Immutable compiled bytecode.
 */
export class Code {
  /** Source filename. */
  readonly filename: string;

  /** Native primitives referenced by `PushNative`, by index. */
  readonly natives: readonly NativeEntry[];

  /** Compiled functions in declaration order. */
  readonly functions: readonly FunctionInfo[];

  private readonly data: Uint8Array;
  private readonly view: DataView;
  private readonly functionsByAddress: ReadonlyMap<number, FunctionInfo>;

  constructor(
    bytes: Uint8Array,
    natives: NativeEntry[],
    functions: FunctionInfo[],
    filename: string
  ) {
    this.data = bytes.slice();
    this.view = new DataView(this.data.buffer, this.data.byteOffset, this.data.byteLength);
    this.natives = Object.freeze([...natives]);
    this.functions = Object.freeze([...functions]);
    this.functionsByAddress = new Map(functions.map((fn) => [fn.address, fn]));
    this.filename = filename;
    Object.freeze(this);
  }

  /**
   * Size of the bytecode in bytes.
   */
  get length(): number {
    return this.data.length;
  }

  /**
   * Copy of the raw bytecode.
   */
  bytes(): Uint8Array {
    return this.data.slice();
  }

  /**
   * Read an unsigned byte at an offset.
   */
  readU8(offset: number): number {
    this.checkRead(offset, 1);
    return this.view.getUint8(offset);
  }

  /**
   * Read a little-endian unsigned 32-bit value at an offset.
   */
  readU32(offset: number): number {
    this.checkRead(offset, 4);
    return this.view.getUint32(offset, true);
  }

  /**
   * Read a little-endian signed 64-bit value at an offset.
   */
  readI64(offset: number): bigint {
    this.checkRead(offset, 8);
    return this.view.getBigInt64(offset, true);
  }

  /**
   * Get the function whose entry point is at an address.
   */
  functionAt(address: number): FunctionInfo | undefined {
    return this.functionsByAddress.get(address);
  }

  /**
   * Get a native entry by table index.
   */
  getNative(index: number): NativeEntry | undefined {
    return this.natives[index];
  }

  private checkRead(offset: number, size: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset + size > this.data.length) {
      throw new RangeError(
        `read of ${size} byte(s) at offset ${offset} is outside the code (length ${this.data.length})`
      );
    }
  }
}

/**
 * Growable byte buffer used during compilation.
 */
export class CodeBuilder {
  private buffer: Uint8Array;
  private view: DataView;
  private size: number = 0;

  constructor(initialCapacity: number = 256) {
    this.buffer = new Uint8Array(initialCapacity);
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Get current write offset.
   */
  offset(): number {
    return this.size;
  }

  /**
   * Emit an opcode byte. Returns the offset it was written at.
   */
  emitOp(op: Op): number {
    const offset = this.reserve(OPCODE_SIZE);
    this.view.setUint8(offset, op);
    return offset;
  }

  /**
   * Emit a little-endian unsigned 32-bit operand.
   */
  emitU32(value: number): number {
    checkU32(value);
    const offset = this.reserve(4);
    this.view.setUint32(offset, value, true);
    return offset;
  }

  /**
   * Emit a little-endian signed 64-bit operand.
   */
  emitI64(value: bigint): number {
    if (BigInt.asIntN(64, value) !== value) {
      throw new RangeError(`value ${value} does not fit in a signed 64-bit operand`);
    }
    const offset = this.reserve(8);
    this.view.setBigInt64(offset, value, true);
    return offset;
  }

  /**
   * Overwrite a previously emitted 32-bit operand.
   */
  patchU32(offset: number, value: number): void {
    checkU32(value);
    if (!Number.isInteger(offset) || offset < 0 || offset + 4 > this.size) {
      throw new RangeError(`patch at offset ${offset} is outside the emitted code (length ${this.size})`);
    }
    this.view.setUint32(offset, value, true);
  }

  /**
   * Convert to immutable Code.
   */
  toCode(natives: NativeEntry[], functions: FunctionInfo[], filename: string): Code {
    return new Code(this.buffer.subarray(0, this.size), natives, functions, filename);
  }

  /**
   * Claim `count` bytes at the end, growing the buffer as needed.
   */
  private reserve(count: number): number {
    const offset = this.size;
    const needed = offset + count;
    if (needed > this.buffer.length) {
      let capacity = Math.max(this.buffer.length, 16);
      while (capacity < needed) {
        capacity *= 2;
      }
      const grown = new Uint8Array(capacity);
      grown.set(this.buffer.subarray(0, this.size));
      this.buffer = grown;
      this.view = new DataView(grown.buffer);
    }
    this.size = needed;
    return offset;
  }
}

function checkU32(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_U32) {
    throw new RangeError(`value ${value} does not fit in an unsigned 32-bit operand`);
  }
}
