/**
 * Operator precedence levels for Pratt parsing.
 * Higher numbers = higher precedence (binds tighter).
 */

import { TokenKind } from "../token/token.js";

export const enum Precedence {
  LOWEST = 1,
  SUM = 2, // +
  CALL = 3, // fn()
}

/**
 * Get the precedence for a token type.
 */
export function getPrecedence(kind: TokenKind): Precedence {
  switch (kind) {
    case TokenKind.PLUS:
      return Precedence.SUM;
    case TokenKind.LPAREN:
      return Precedence.CALL;
    default:
      return Precedence.LOWEST;
  }
}
