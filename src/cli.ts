#!/usr/bin/env node
/**
 * Tally CLI - command-line interface for the Tally language.
 */

import * as fs from "fs/promises";
import { compileSource, runCode, RunOptions } from "./runner.js";
import { formatDisassembly } from "./bytecode/disasm.js";
import { opName } from "./bytecode/opcode.js";
import type { TraceStep } from "./vm/vm.js";

const VERSION = "0.1.0";

function printUsage(): void {
  console.log(`
Tally v${VERSION} - a tiny stack-machine language

Usage:
  tally [options] <file>

Options:
  -h, --help      Show this help message
  -v, --version   Show version
  -e, --eval      Run code from the command line
  -d, --disasm    Print the compiled bytecode instead of running it
  -t, --trace     Print each executed instruction to stderr

Examples:
  tally program.tly
  tally -e 'func p(x: int): int = "print_int"  p(1 + 2)'
  tally -d program.tly
`);
}

function printVersion(): void {
  console.log(`Tally ${VERSION}`);
}

function traceStep(step: TraceStep): void {
  console.error(`${String(step.pc).padStart(5)}  ${opName(step.op).padEnd(10)} [${step.stackHeight}]`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let evalCode: string | null = null;
  let disasm = false;
  let trace = false;
  let file: string | null = null;

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      return;
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      return;
    } else if (arg === "-e" || arg === "--eval") {
      i++;
      if (i >= args.length) {
        console.error("Error: -e requires an argument");
        process.exit(1);
      }
      evalCode = args[i];
    } else if (arg === "-d" || arg === "--disasm") {
      disasm = true;
    } else if (arg === "-t" || arg === "--trace") {
      trace = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    } else if (file === null) {
      file = arg;
    } else {
      console.error(`Error: Unexpected argument: ${arg}`);
      process.exit(1);
    }
    i++;
  }

  let source: string;
  let filename: string;
  if (evalCode !== null) {
    source = evalCode;
    filename = "<eval>";
  } else if (file !== null) {
    source = await fs.readFile(file, "utf-8");
    filename = file;
  } else {
    printUsage();
    process.exit(1);
  }

  const options: RunOptions = { filename };
  if (trace) {
    options.trace = traceStep;
  }

  if (disasm) {
    console.log(formatDisassembly(compileSource(source, options)));
  } else {
    runCode(source, options);
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
