/**
 * Input/output channels used by the standard primitives.
 */

import * as fs from "fs";

/**
 * Integer input and output channel.
 */
export interface NativeIO {
  /** Next integer of input, or 0 at end of input. */
  readInt(): bigint;
  /** Write an integer followed by a newline. */
  writeInt(value: bigint): void;
}

/**
 * In-memory channel fed from a fixed list of inputs.
 */
export interface MemoryIO extends NativeIO {
  /** Values written so far, in order. */
  readonly output: bigint[];
}

const CHUNK_SIZE = 4096;
const WHITESPACE = /\s/;

/**
 * Parse one whitespace-delimited input token.
 */
export function parseIntToken(token: string): bigint {
  if (!/^[+-]?\d+$/.test(token)) {
    throw new Error(`invalid integer input '${token}'`);
  }
  const value = BigInt(token);
  if (BigInt.asIntN(64, value) !== value) {
    throw new Error(`integer input out of range: ${token}`);
  }
  return value;
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

/**
 * Channel over the process's standard input and output. Input is read
 * synchronously, so a program waiting on `read_int` blocks.
 */
export function createStdio(): NativeIO {
  const chunk = Buffer.alloc(CHUNK_SIZE);
  let pending = "";
  let eof = false;

  const fill = (): void => {
    let read: number;
    try {
      read = fs.readSync(0, chunk, 0, CHUNK_SIZE, null);
    } catch (err) {
      const code = errorCode(err);
      if (code === "EAGAIN") {
        return;
      }
      if (code === "EOF") {
        eof = true;
        return;
      }
      throw err;
    }
    if (read === 0) {
      eof = true;
    } else {
      pending += chunk.toString("utf-8", 0, read);
    }
  };

  return {
    readInt(): bigint {
      for (;;) {
        pending = pending.replace(/^\s+/, "");
        let end = 0;
        while (end < pending.length && !WHITESPACE.test(pending[end])) {
          end++;
        }
        // A token is complete once whitespace or end of input follows it.
        if (pending.length > 0 && (end < pending.length || eof)) {
          const token = pending.slice(0, end);
          pending = pending.slice(end);
          return parseIntToken(token);
        }
        if (eof) {
          return 0n;
        }
        fill();
      }
    },
    writeInt(value: bigint): void {
      console.log(value.toString());
    },
  };
}

/**
 * Channel that reads from `inputs` and records writes in `output`.
 */
export function createMemoryIO(inputs: readonly (bigint | number)[] = []): MemoryIO {
  const queue = inputs.map((value) => BigInt(value));
  let next = 0;
  const output: bigint[] = [];
  return {
    output,
    readInt(): bigint {
      if (next >= queue.length) {
        return 0n;
      }
      return queue[next++];
    },
    writeInt(value: bigint): void {
      output.push(value);
    },
  };
}
