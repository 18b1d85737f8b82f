/**
 * Tally - a tiny imperative language compiled to stack-machine bytecode.
 *
 * @packageDocumentation
 */

// Token exports
export { TokenKind, newToken, newPosition, NoPos, lookupIdentifier } from "./token/token.js";
export type { Token, Position } from "./token/token.js";

// Lexer exports
export { Lexer, LexerError, tokenize } from "./lexer/lexer.js";

// AST exports
export * from "./ast/nodes.js";

// Parser exports
export { Parser, ParserError, parse } from "./parser/parser.js";
export { Precedence, getPrecedence } from "./parser/precedence.js";

// Verifier exports
export { Verifier, VerifierError, verify } from "./verifier/verifier.js";

// Bytecode exports
export * from "./bytecode/index.js";

// Compiler exports
export * from "./compiler/index.js";

// Value exports
export * from "./value/index.js";

// VM exports
export * from "./vm/index.js";

// Builtins exports
export * from "./builtins/index.js";

// Runner exports
export { RunError, compileSource, runCode, runFile } from "./runner.js";
export type { RunOptions, RunResult } from "./runner.js";
