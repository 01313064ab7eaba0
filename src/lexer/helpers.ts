/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { Token, TokenKind } from '../types.js';
import { lexeme, type ScannerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierChar(ch: string): boolean {
  return isLetter(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeToken(
  kind: TokenKind,
  text: string,
  start: number,
  end: number
): Token {
  return { kind, text, span: { start, end } };
}

/** Token spanning from the token start to the cursor */
export function tokenFromState(state: ScannerState, kind: TokenKind): Token {
  return makeToken(kind, lexeme(state), state.start, state.pos);
}
