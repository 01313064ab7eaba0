/**
 * Operator and Keyword Lookup Tables
 */

import type { KeywordKind, TokenKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

/**
 * Operators that become two characters wide when followed by '='.
 * Maps the first character to [single kind, kind with '='].
 */
export const EQUALS_SUFFIX_OPERATORS = Object.freeze<
  Record<string, readonly [TokenKind, TokenKind]>
>({
  '=': [TOKEN_KINDS.ASSIGN, TOKEN_KINDS.EQUAL],
  '>': [TOKEN_KINDS.GREATER, TOKEN_KINDS.GREATER_EQUAL],
  '<': [TOKEN_KINDS.LESSER, TOKEN_KINDS.LESSER_EQUAL],
});

/** Single-character operator and punctuation lookup table */
export const SINGLE_CHAR_OPERATORS = Object.freeze<Record<string, TokenKind>>(
  {
    '*': TOKEN_KINDS.MULTIPLY,
    '/': TOKEN_KINDS.DIVIDE,
    '+': TOKEN_KINDS.PLUS,
    '-': TOKEN_KINDS.MINUS,
    '{': TOKEN_KINDS.BRACE_OPEN,
    '}': TOKEN_KINDS.BRACE_CLOSE,
    '(': TOKEN_KINDS.PAREN_OPEN,
    ')': TOKEN_KINDS.PAREN_CLOSE,
    ',': TOKEN_KINDS.COMMA,
    ':': TOKEN_KINDS.COLON,
    ';': TOKEN_KINDS.SEMI_COLON,
  }
);

/** Keyword lookup table (exact, case-sensitive) */
export const KEYWORDS: ReadonlyMap<string, KeywordKind> = new Map<
  string,
  KeywordKind
>([
  ['int', TOKEN_KINDS.INT],
  ['double', TOKEN_KINDS.DOUBLE],
  ['string', TOKEN_KINDS.STRING],
  ['function', TOKEN_KINDS.FUNCTION],
  ['return', TOKEN_KINDS.RETURN],
  ['if', TOKEN_KINDS.IF],
  ['else', TOKEN_KINDS.ELSE],
  ['for', TOKEN_KINDS.FOR],
  ['continue', TOKEN_KINDS.CONTINUE],
  ['break', TOKEN_KINDS.BREAK],
]);

const KEYWORD_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>(
  KEYWORDS.values()
);

export function isKeywordKind(kind: TokenKind): kind is KeywordKind {
  return KEYWORD_KINDS.has(kind);
}
