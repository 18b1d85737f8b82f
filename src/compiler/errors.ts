/**
 * Errors raised by the code generator.
 */

import { Position } from "../token/token.js";

/**
 * Compilation error: the program is well formed but cannot be compiled,
 * such as a prototype naming a primitive the host does not provide.
 */
export class CompilerError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at line ${position.line + 1}, column ${position.column + 1}`);
    this.name = "CompilerError";
  }
}

/**
 * Broken compiler invariant. Seeing one means the verifier let an invalid
 * program through or the code generator has a bug.
 */
export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InternalError";
  }
}

/**
 * Throw an InternalError unless `condition` holds.
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InternalError(message);
  }
}
