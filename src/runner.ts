/**
 * Tally Runner - compile and execute Tally programs.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { LexerError } from "./lexer/lexer.js";
import { ParserError, parse } from "./parser/parser.js";
import { VerifierError, verify } from "./verifier/verifier.js";
import { compile } from "./compiler/compiler.js";
import { Code } from "./bytecode/code.js";
import { VM, TraceStep } from "./vm/vm.js";
import { createBuiltins } from "./builtins/builtins.js";
import type { NativeRegistry } from "./builtins/native.js";
import { NativeIO, createStdio } from "./builtins/stdio.js";

/**
 * Options shared by the compile and run entry points.
 */
export interface RunOptions {
  /** Filename used in error messages. */
  filename?: string;
  /** Channel for `print_int` and `read_int`. Defaults to stdin/stdout. */
  io?: NativeIO;
  /** Primitive registry. Defaults to the builtins over `io`. */
  natives?: NativeRegistry;
  /** Maximum operand stack size. */
  maxStackSize?: number;
  /** Called before each instruction executes. */
  trace?: (step: TraceStep) => void;
}

/**
 * Outcome of a completed run.
 */
export interface RunResult {
  code: Code;
  /** Operand stack height when the program stopped. */
  stackHeight: number;
}

/**
 * Error from any phase, prefixed with the phase and the file.
 */
export class RunError extends Error {
  constructor(
    public readonly phase: string,
    public readonly filename: string,
    cause: unknown
  ) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`${phase} error in ${filename}: ${message}`, { cause });
    this.name = "RunError";
  }
}

/**
 * Phase of an error raised before the program runs.
 */
function phaseOf(err: unknown): string {
  if (err instanceof LexerError) return "Syntax";
  if (err instanceof ParserError) return "Parse";
  if (err instanceof VerifierError) return "Verification";
  return "Compile";
}

/**
 * Parse, verify and compile source code.
 */
export function compileSource(source: string, options: RunOptions = {}): Code {
  const filename = options.filename ?? "<input>";
  const natives = options.natives ?? createBuiltins(options.io ?? createStdio());
  try {
    const program = parse(source, filename);
    verify(program);
    return compile(program, { natives, filename });
  } catch (err) {
    throw new RunError(phaseOf(err), filename, err);
  }
}

/**
 * Compile and run source code.
 */
export function runCode(source: string, options: RunOptions = {}): RunResult {
  const filename = options.filename ?? "<input>";
  const code = compileSource(source, options);
  const vm = new VM({ maxStackSize: options.maxStackSize, trace: options.trace });
  try {
    vm.run(code);
  } catch (err) {
    throw new RunError("Runtime", filename, err);
  }
  return { code, stackHeight: vm.stackHeight };
}

/**
 * Run a Tally source file.
 */
export async function runFile(filepath: string, options: RunOptions = {}): Promise<RunResult> {
  const resolved = path.resolve(filepath);
  let source: string;
  try {
    source = await fs.readFile(resolved, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`cannot read ${filepath}: ${message}`, { cause: err });
  }
  return runCode(source, { ...options, filename: options.filename ?? filepath });
}
